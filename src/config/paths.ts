import * as os from "os";
import * as path from "path";

export const APP_NAME = "local-llm-chat";

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return (
    env.LOCAL_LLM_CHAT_CONFIG_DIR?.trim() ||
    path.join(os.homedir(), `.${APP_NAME}`)
  );
}
