import { promises as fsp } from "fs";
import * as path from "path";
import { resolveConfigDir } from "../../config/paths";
import { ConfigPort } from "../../ports/outbound/config.port";
import { logger } from "../../utils/logger";

interface StoredConfig {
  defaultModel?: string;
}

function isStoredConfig(value: unknown): value is StoredConfig {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const defaultModel: unknown = Reflect.get(value, "defaultModel");
  return defaultModel === undefined || typeof defaultModel === "string";
}

function parseStoredConfig(raw: string): StoredConfig | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isStoredConfig(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export class FileConfigAdapter implements ConfigPort {
  private readonly configFile: string;

  constructor(private readonly configDir: string = resolveConfigDir()) {
    this.configFile = path.join(configDir, "config.json");
  }

  async getDefaultModel(): Promise<string | undefined> {
    const data = await this.readConfig();
    return data.defaultModel?.trim() || undefined;
  }

  async setDefaultModel(model: string): Promise<void> {
    const current = await this.readConfig();
    const next: StoredConfig = {
      ...current,
      defaultModel: model,
    };

    await fsp.mkdir(this.configDir, { recursive: true });
    await fsp.writeFile(
      this.configFile,
      JSON.stringify(next, null, 2),
      "utf-8",
    );
    await logger.info(`default model set to ${model}`);
  }

  private async readConfig(): Promise<StoredConfig> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.configFile, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return {};
      }
      throw error;
    }

    const parsed = parseStoredConfig(raw);
    if (parsed) {
      return parsed;
    }
    console.error(`Ignoring unreadable config file: ${this.configFile}`);
    await logger.warn(`config file ignored: ${this.configFile}`);
    return {};
  }
}
