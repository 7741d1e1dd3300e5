/**
 * Generation
 *
 * A leaf observation for one model invocation. Carries model settings,
 * prompt reference, token usage and the first-token timestamp.
 */

import type {
  Generation,
  GenerationBody,
  GenerationOptions,
  GenerationUpdateOptions,
  IngestionEvent,
  Metadata,
  Usage,
} from './types';
import type { EntityRuntime, ParentRef } from './observation';
import { ObservationHandle } from './observation';
import { encodeEvent } from './encoder';

export class GenerationHandle extends ObservationHandle<GenerationUpdateOptions> implements Generation {
  private modelValue: string | undefined;
  private modelParameters: Metadata | undefined;
  private promptName: string | undefined;
  private promptVersion: number | undefined;
  private usageValue: Usage | undefined;
  private completionStart: Date | undefined;

  /** @internal */
  constructor(runtime: EntityRuntime, parent: ParentRef, name: string, options: GenerationOptions = {}) {
    super(runtime, parent, name, options);
    this.modelValue = options.model;
    this.modelParameters = options.modelParameters ? { ...options.modelParameters } : undefined;
    this.promptName = options.promptName;
    this.promptVersion = options.promptVersion;
    this.usageValue = normalizeUsage(options.usage);
    this.completionStart = options.completionStartTime;

    runtime.sink.enqueue(encodeEvent('generation-create', this.body()));
  }

  get model(): string | undefined {
    return this.modelValue;
  }

  get usage(): Readonly<Usage> | undefined {
    return this.usageValue;
  }

  get completionStartTime(): Date | undefined {
    return this.completionStart;
  }

  /**
   * Mark when the first token arrived (streaming). Ships with the next
   * update() or end().
   */
  markCompletionStart(): void {
    if (this.ended || this.completionStart) return;
    this.completionStart = new Date();
  }

  setOutput(output: unknown): void {
    this.update({ output });
  }

  setUsage(usage: Usage): void {
    this.update({ usage });
  }

  protected applyUpdate(options: GenerationUpdateOptions): void {
    super.applyUpdate(options);

    if (options.model) {
      this.modelValue = options.model;
    }
    if (options.modelParameters) {
      this.modelParameters = { ...this.modelParameters, ...options.modelParameters };
    }
    if (options.promptName !== undefined) {
      this.promptName = options.promptName;
    }
    if (options.promptVersion !== undefined) {
      this.promptVersion = options.promptVersion;
    }
    if (options.usage) {
      this.usageValue = normalizeUsage(options.usage);
    }
    if (options.completionStartTime) {
      this.completionStart = options.completionStartTime;
    }
  }

  protected encodeUpdate(): IngestionEvent {
    return encodeEvent('generation-update', this.body());
  }

  private body(): GenerationBody {
    return {
      ...this.baseBody(),
      completionStartTime: this.completionStart?.toISOString(),
      model: this.modelValue,
      modelParameters: this.runtime.sanitizer.metadata(this.modelParameters),
      usage: this.usageValue ? { ...this.usageValue } : undefined,
      promptName: this.promptName,
      promptVersion: this.promptVersion,
    };
  }
}

/**
 * Copy usage, deriving totalTokens from prompt + completion when absent
 */
export function normalizeUsage(usage: Usage | undefined): Usage | undefined {
  if (!usage) return undefined;

  const normalized: Usage = { ...usage };
  if (
    normalized.totalTokens === undefined &&
    normalized.promptTokens !== undefined &&
    normalized.completionTokens !== undefined
  ) {
    normalized.totalTokens = normalized.promptTokens + normalized.completionTokens;
  }
  return normalized;
}
