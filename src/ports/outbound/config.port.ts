export interface ConfigPort {
  getDefaultModel(): Promise<string | undefined>;
  setDefaultModel(model: string): Promise<void>;
}
