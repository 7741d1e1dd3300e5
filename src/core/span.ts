/**
 * Span
 *
 * A unit of work nested inside a trace or another span.
 */

import type {
  Generation,
  GenerationOptions,
  IngestionEvent,
  Span,
  SpanOptions,
  SpanUpdateOptions,
} from './types';
import type { EntityRuntime, ParentRef } from './observation';
import { ObservationHandle } from './observation';
import { GenerationHandle } from './generation';
import { encodeEvent } from './encoder';

export class SpanHandle extends ObservationHandle<SpanUpdateOptions> implements Span {
  /** @internal */
  constructor(runtime: EntityRuntime, parent: ParentRef, name: string, options: SpanOptions = {}) {
    super(runtime, parent, name, options);
    runtime.sink.enqueue(encodeEvent('span-create', this.baseBody()));
  }

  /**
   * Start a child span. It shares this span's trace and points back at it.
   */
  span(name: string, options?: SpanOptions): Span {
    return new SpanHandle(this.runtime, this.childRef(), name, options);
  }

  generation(name: string, options?: GenerationOptions): Generation {
    return new GenerationHandle(this.runtime, this.childRef(), name, options);
  }

  protected encodeUpdate(): IngestionEvent {
    return encodeEvent('span-update', this.baseBody());
  }

  private childRef(): ParentRef {
    return { traceId: this.traceId, parentSpanId: this.id };
  }
}
