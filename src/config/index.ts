import fs from 'fs';
import path from 'path';
import { z, ZodIssue } from 'zod';
import { ConfigError, LogLevel, isLogLevel, DEFAULT_API_KEY } from '../utils';
import {
  DEFAULT_CONTEXT_SIZE,
  DEFAULT_GPU_LAYERS,
  EndpointAddress,
  ModelDescriptor,
} from './models';

export * from './models';

export const DEFAULT_CONFIG_FILE = 'config.json';

const portSchema = z.number().int().min(1).max(65535);

const modelSchema = z.object({
  name: z.string().min(1).optional(),
  file: z.string().min(1),
  context: z.number().int().positive().optional(),
  gpu_layers: z.number().int().min(0).optional(),
  cpu_moe: z.number().int().min(0).optional(),
  temp: z.number().min(0).optional(),
  top_k: z.number().int().min(0).optional(),
  top_p: z.number().min(0).max(1).optional(),
  min_p: z.number().min(0).max(1).optional(),
  extra_args: z.array(z.string()).optional(),
  host: z.string().min(1).optional(),
  port: portSchema.optional(),
});

const rawConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: portSchema,
    llama_host: z.string().min(1),
    llama_port: portSchema,
  }),
  security: z.object({
    api_key: z.string().min(1),
  }),
  paths: z.object({
    llama_server: z.string().min(1),
    models_base: z.string().min(1),
  }),
  models: z.record(z.string(), modelSchema),
});

export type RawConfig = z.infer<typeof rawConfigSchema>;

export interface AppConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  apiKey: string;
  llamaServerPath: string;
  modelsBase: string;
  engine: EndpointAddress;
  models: ModelDescriptor[];
}

export interface LoadedConfig {
  config: AppConfig;
  warnings: string[];
}

export interface ConfigOverrides {
  host?: string;
  port?: number;
}

export interface ConfigLoader {
  load(): LoadedConfig;
}

export interface FileConfigLoaderOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
}

function describeIssue(issue: ZodIssue): string {
  const key = issue.path.join('.');

  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `Missing required config key: '${key}'`;
  }

  return key ? `Invalid config value at '${key}': ${issue.message}` : issue.message;
}

/**
 * Validate a parsed config document. Returns the problems that block startup
 * and the warnings worth printing.
 */
export interface ConfigValidationResult {
  config: RawConfig | null;
  errors: string[];
  warnings: string[];
}

export function validateRawConfig(raw: unknown): ConfigValidationResult {
  const parsed = rawConfigSchema.safeParse(raw);

  if (!parsed.success) {
    return { config: null, errors: parsed.error.issues.map(describeIssue), warnings: [] };
  }

  const config = parsed.data;
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.security.api_key === DEFAULT_API_KEY) {
    warnings.push('Using default API key - please change for security!');
  }

  if (!fs.existsSync(config.paths.llama_server)) {
    errors.push(`llama-server not found at: ${config.paths.llama_server}`);
  }

  const modelsBaseExists = fs.existsSync(config.paths.models_base);

  if (!modelsBaseExists) {
    errors.push(`Models directory not found at: ${config.paths.models_base}`);
  }

  const modelEntries = Object.entries(config.models);

  if (modelEntries.length === 0) {
    warnings.push('No models defined in config');
  }

  for (const [modelId, model] of modelEntries) {
    if (!model.name) {
      warnings.push(`Model '${modelId}' missing 'name' field`);
    }

    const modelPath = path.join(config.paths.models_base, model.file);

    if (modelsBaseExists && !fs.existsSync(modelPath)) {
      warnings.push(`Model file not found: ${modelPath}`);
    }
  }

  return { config, errors, warnings };
}

export function toModelDescriptors(raw: RawConfig): ModelDescriptor[] {
  return Object.entries(raw.models).map(([id, model]) => ({
    id,
    name: model.name ?? id,
    command: raw.paths.llama_server,
    modelPath: path.join(raw.paths.models_base, model.file),
    context: model.context ?? DEFAULT_CONTEXT_SIZE,
    gpuLayers: model.gpu_layers ?? DEFAULT_GPU_LAYERS,
    cpuMoe: model.cpu_moe,
    sampling: {
      temp: model.temp,
      topK: model.top_k,
      topP: model.top_p,
      minP: model.min_p,
    },
    extraArgs: model.extra_args ?? [],
    endpoint: {
      host: model.host ?? raw.server.llama_host,
      port: model.port ?? raw.server.llama_port,
    },
  }));
}

/**
 * Loads `config.json` and layers environment and command-line overrides on top.
 * Precedence: overrides > PORT/HOST/LOG_LEVEL > file.
 */
export class FileConfigLoader implements ConfigLoader {
  private readonly configPath: string;
  private readonly overrides: ConfigOverrides;

  constructor(options: FileConfigLoaderOptions = {}) {
    this.configPath = path.resolve(
      options.configPath || process.env['CONFIG_PATH'] || DEFAULT_CONFIG_FILE
    );
    this.overrides = options.overrides || {};
  }

  getConfigPath(): string {
    return this.configPath;
  }

  load(): LoadedConfig {
    const raw = this.readConfigFile();
    const result = validateRawConfig(raw);

    if (result.config === null || result.errors.length > 0) {
      throw new ConfigError(result.errors);
    }

    const rawConfig = result.config;

    return {
      config: {
        host: this.overrides.host || process.env['HOST'] || rawConfig.server.host,
        port: this.overrides.port || this.parsePort() || rawConfig.server.port,
        logLevel: this.parseLogLevel(),
        apiKey: rawConfig.security.api_key,
        llamaServerPath: rawConfig.paths.llama_server,
        modelsBase: rawConfig.paths.models_base,
        engine: {
          host: rawConfig.server.llama_host,
          port: rawConfig.server.llama_port,
        },
        models: toModelDescriptors(rawConfig),
      },
      warnings: result.warnings,
    };
  }

  private readConfigFile(): unknown {
    let contents: string;

    try {
      contents = fs.readFileSync(this.configPath, 'utf-8');
    } catch {
      throw new ConfigError([`Config file not found at: ${this.configPath}`]);
    }

    try {
      return JSON.parse(contents);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError([`Config file is not valid JSON: ${message}`]);
    }
  }

  private parsePort(): number | null {
    const portStr = process.env['PORT'];

    if (!portStr) {
      return null;
    }

    const port = parseInt(portStr, 10);

    if (isNaN(port) || port < 1 || port > 65535) {
      return null;
    }

    return port;
  }

  private parseLogLevel(): LogLevel {
    const level = process.env['LOG_LEVEL'];

    if (level && isLogLevel(level)) {
      return level;
    }

    return 'info';
  }
}
