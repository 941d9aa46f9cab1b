import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { LanRelayConfigSchema, type LanRelayConfig, type LanRelayConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ConfigManagerOptions {
  /** Directory holding `.lanrelay.yaml`. Default: process.cwd() */
  projectDir?: string;
  /** Directory holding `config.yaml` and `logs/`. Default: $LANRELAY_HOME or ~/.lanrelay */
  globalDir?: string;
  /** Environment to read LANRELAY_* variables from. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: LanRelayConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.globalDir = options.globalDir ?? this.env.LANRELAY_HOME ?? join(homedir(), '.lanrelay');
    this.projectDir = options.projectDir ?? process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: LanRelayConfigInput): LanRelayConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.lanrelay.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const result = LanRelayConfigSchema.safeParse(raw);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): LanRelayConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Create the default global config unless one exists.
   */
  createDefaultConfig(): { path: string; created: boolean } {
    if (!existsSync(this.globalDir)) {
      mkdirSync(this.globalDir, { recursive: true });
    }
    const configPath = join(this.globalDir, 'config.yaml');
    if (existsSync(configPath)) {
      return { path: configPath, created: false };
    }

    const defaultConfig = `# lanrelay configuration
# Fallback receiver, used until discovery or a manual override replaces it
endpoint:
  host: 192.168.1.4
  port: 3000

discovery:
  enabled: true
  serviceType: _photosync._tcp

pipeline:
  debounceMs: 500
  dedupWindowMs: 5000

# photos:
#   watchDir: /path/to/camera/roll
`;
    writeFileSync(configPath, defaultConfig, 'utf-8');
    return { path: configPath, created: true };
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const endpoint: RawConfig = isRecord(raw.endpoint) ? { ...raw.endpoint } : {};
    const discovery: RawConfig = isRecord(raw.discovery) ? { ...raw.discovery } : {};
    const photos: RawConfig = isRecord(raw.photos) ? { ...raw.photos } : {};
    const logging: RawConfig = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (this.env.LANRELAY_HOST) {
      endpoint.host = this.env.LANRELAY_HOST;
    }
    if (this.env.LANRELAY_PORT) {
      endpoint.port = Number(this.env.LANRELAY_PORT);
    }
    if (this.env.LANRELAY_WATCH_DIR) {
      photos.watchDir = this.env.LANRELAY_WATCH_DIR;
    }
    if (this.env.LANRELAY_DISCOVERY) {
      discovery.enabled = !['0', 'false', 'off', 'no'].includes(this.env.LANRELAY_DISCOVERY.toLowerCase());
    }
    if (this.env.LANRELAY_LOG_LEVEL) {
      logging.level = this.env.LANRELAY_LOG_LEVEL;
    }

    return { ...raw, endpoint, discovery, photos, logging };
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else if (incoming !== undefined) {
        result[key] = incoming;
      }
    }
    return result;
  }
}
