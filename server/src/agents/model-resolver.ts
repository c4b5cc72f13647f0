import type { ModelOverrides, ModelStage } from './types.js';

/**
 * Per-stage model selection: a non-empty override for the stage wins,
 * otherwise the pipeline default. Built once per run from the request.
 */
export class ModelResolver {
  constructor(
    private readonly overrides: ModelOverrides,
    private readonly defaultModel: string,
  ) {}

  resolve(stage: ModelStage): string {
    const override = this.overrides[stage]?.trim();
    return override ? override : this.defaultModel;
  }
}
