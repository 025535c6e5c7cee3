/**
 * Model descriptors and the llama-server command line built from them
 */

export const DEFAULT_CONTEXT_SIZE = 8192;
export const DEFAULT_GPU_LAYERS = 48;

export interface EndpointAddress {
  host: string;
  port: number;
}

export interface SamplingParameters {
  temp?: number;
  topK?: number;
  topP?: number;
  minP?: number;
}

export interface ModelDescriptor {
  readonly id: string;
  readonly name: string;
  /** Executable that serves the model. */
  readonly command: string;
  readonly modelPath: string;
  readonly context: number;
  readonly gpuLayers: number;
  /** MoE expert layers kept on the CPU (`--n-cpu-moe`). */
  readonly cpuMoe?: number;
  readonly sampling: Readonly<SamplingParameters>;
  readonly extraArgs: readonly string[];
  readonly endpoint: Readonly<EndpointAddress>;
}

export interface LaunchCommand {
  command: string;
  args: string[];
}

export interface ModelSummary {
  name: string;
  context: number;
}

export interface ModelCatalog {
  getModel(modelId: string): ModelDescriptor | undefined;
  listModels(): ModelDescriptor[];
}

export function buildLaunchCommand(model: ModelDescriptor): LaunchCommand {
  const args = [
    '-m', model.modelPath,
    '--host', model.endpoint.host,
    '--port', String(model.endpoint.port),
    '-c', String(model.context),
    '-ngl', String(model.gpuLayers),
  ];

  if (model.cpuMoe !== undefined) {
    args.push('--n-cpu-moe', String(model.cpuMoe));
  }

  const { temp, topK, topP, minP } = model.sampling;

  if (temp !== undefined) args.push('--temp', String(temp));
  if (topK !== undefined) args.push('--top-k', String(topK));
  if (topP !== undefined) args.push('--top-p', String(topP));
  if (minP !== undefined) args.push('--min-p', String(minP));

  args.push(...model.extraArgs);

  return { command: model.command, args };
}

export function formatLaunchCommand(launch: LaunchCommand): string {
  return [launch.command, ...launch.args].join(' ');
}

/**
 * Read-only catalogue over the descriptors produced by the config loader.
 */
export class StaticModelCatalog implements ModelCatalog {
  private readonly models: ReadonlyMap<string, ModelDescriptor>;

  constructor(models: readonly ModelDescriptor[]) {
    this.models = new Map(models.map((model) => [model.id, model]));
  }

  getModel(modelId: string): ModelDescriptor | undefined {
    return this.models.get(modelId);
  }

  listModels(): ModelDescriptor[] {
    return Array.from(this.models.values());
  }
}

export function summarizeModels(catalog: ModelCatalog): Record<string, ModelSummary> {
  const summaries: Record<string, ModelSummary> = {};

  for (const model of catalog.listModels()) {
    summaries[model.id] = { name: model.name, context: model.context };
  }

  return summaries;
}
