export type PullOutcome = "pulled" | "failed" | "unavailable";

export interface ModelPullerPort {
  pull(model: string): Promise<PullOutcome>;
}
