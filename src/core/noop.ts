/**
 * Disabled-mode entities
 *
 * Same interfaces as the live client, no I/O. Callers never need to branch
 * on whether telemetry is enabled.
 */

import type { Client, Generation, Span, Trace, TraceRunOptions, Usage } from './types';
import { runInTrace } from './context';

const EPOCH = new Date(0);

export class NoopGeneration implements Generation {
  readonly id = '';
  readonly traceId = '';
  readonly parentSpanId = '';
  readonly name: string;
  readonly startTime = EPOCH;
  readonly endTime: Date | undefined = undefined;
  readonly ended = false;
  readonly model: string | undefined = undefined;
  readonly usage: Readonly<Usage> | undefined = undefined;
  readonly completionStartTime: Date | undefined = undefined;

  constructor(name = '') {
    this.name = name;
  }

  update(): void {}
  end(): void {}
  score(): void {}
  markCompletionStart(): void {}
  setOutput(): void {}
  setUsage(): void {}
}

export class NoopSpan implements Span {
  readonly id = '';
  readonly traceId = '';
  readonly parentSpanId = '';
  readonly name: string;
  readonly startTime = EPOCH;
  readonly endTime: Date | undefined = undefined;
  readonly ended = false;

  constructor(name = '') {
    this.name = name;
  }

  update(): void {}
  end(): void {}
  score(): void {}

  span(name: string): Span {
    return new NoopSpan(name);
  }

  generation(name: string): Generation {
    return new NoopGeneration(name);
  }
}

export class NoopTrace implements Trace {
  readonly id = '';
  readonly name: string;
  readonly startTime = EPOCH;
  readonly endTime: Date | undefined = undefined;
  readonly ended = false;

  constructor(name = '') {
    this.name = name;
  }

  update(): void {}
  end(): void {}
  score(): void {}

  span(name: string): Span {
    return new NoopSpan(name);
  }

  generation(name: string): Generation {
    return new NoopGeneration(name);
  }
}

export class NoopClient implements Client {
  readonly enabled = false;

  startTrace(name: string): Trace {
    return new NoopTrace(name);
  }

  trace<T>(nameOrOptions: string | TraceRunOptions, fn: (trace: Trace) => Promise<T>): Promise<T> {
    return runInTrace(this, nameOrOptions, fn);
  }

  score(): void {}

  async flush(): Promise<void> {}

  async close(): Promise<void> {}

  getPendingCount(): number {
    return 0;
  }
}
