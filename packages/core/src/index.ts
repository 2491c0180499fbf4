import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';

export type RunId = string;
export type SpanId = string;

export type TraceEvent =
  | {
      type: 'span_start';
      timestamp: string;
      runId: RunId;
      spanId: SpanId;
      parentSpanId?: SpanId;
      name: string;
      metadata?: Record<string, unknown>;
    }
  | {
      type: 'span_end';
      timestamp: string;
      runId: RunId;
      spanId: SpanId;
      parentSpanId?: SpanId;
      name: string;
      durationMs?: number;
      error?: string;
    }
  | {
      type: 'llm_call';
      timestamp: string;
      runId: RunId;
      spanId: SpanId;
      model: string;
      messages: number;
      raw?: string;
      error?: string;
      tokens?: TokenUsage;
      durationMs?: number;
    }
  | {
      type: 'validation_error';
      timestamp: string;
      runId: RunId;
      spanId: SpanId;
      direction: ValidationDirection;
      issues: z.ZodIssue[];
    }
  | {
      type: 'event';
      timestamp: string;
      runId: RunId;
      spanId: SpanId;
      name: string;
      metadata?: Record<string, unknown>;
    };

export interface TraceSink {
  write(event: TraceEvent): void;
  close(): void;
}

export class JsonlTraceSink implements TraceSink {
  private stream: fs.WriteStream;
  private failure?: Error;

  /** Opens the file up front, so an unwritable trace path fails before the run starts. */
  constructor(filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const fd = fs.openSync(filePath, 'a');
    this.stream = fs.createWriteStream(filePath, { fd });
    this.stream.on('error', (err) => {
      this.failure ??= err;
    });
  }

  write(event: TraceEvent): void {
    this.stream.write(`${JSON.stringify(event)}\n`);
  }

  /** Throws the first write error seen so far. */
  close(): void {
    this.stream.end();
    if (this.failure) throw this.failure;
  }
}

/** Keeps events in process. Useful for tests and for embedding the trace in another log. */
export class MemoryTraceSink implements TraceSink {
  readonly events: TraceEvent[] = [];
  closed = false;

  write(event: TraceEvent): void {
    this.events.push(event);
  }

  close(): void {
    this.closed = true;
  }

  ofType<K extends TraceEvent['type']>(type: K): Array<Extract<TraceEvent, { type: K }>> {
    return this.events.filter((event): event is Extract<TraceEvent, { type: K }> => event.type === type);
  }
}

export class Trace {
  constructor(
    private readonly runId: RunId,
    private readonly sink: TraceSink,
    private readonly spanId: SpanId,
    private readonly parentSpanId?: SpanId
  ) {}

  get id(): SpanId {
    return this.spanId;
  }

  get parentId(): SpanId | undefined {
    return this.parentSpanId;
  }

  get run(): RunId {
    return this.runId;
  }

  child(name: string, meta?: Record<string, unknown>): Trace {
    const childSpanId = randomUUID();
    this.sink.write({
      type: 'span_start',
      timestamp: new Date().toISOString(),
      runId: this.runId,
      spanId: childSpanId,
      parentSpanId: this.spanId,
      name,
      metadata: meta,
    });
    return new Trace(this.runId, this.sink, childSpanId, this.spanId);
  }

  async span<T>(name: string, fn: (trace: Trace) => Promise<T>, meta?: Record<string, unknown>): Promise<T> {
    const spanTrace = this.child(name, meta);
    const startTs = Date.now();
    try {
      const result = await fn(spanTrace);
      spanTrace.end(name, startTs);
      return result;
    } catch (err) {
      spanTrace.end(name, startTs, { error: err });
      throw err;
    }
  }

  spanSync<T>(name: string, fn: (trace: Trace) => T, meta?: Record<string, unknown>): T {
    const spanTrace = this.child(name, meta);
    const startTs = Date.now();
    try {
      const result = fn(spanTrace);
      spanTrace.end(name, startTs);
      return result;
    } catch (err) {
      spanTrace.end(name, startTs, { error: err });
      throw err;
    }
  }

  end(name: string, startTs: number, failure?: { error: unknown }): void {
    this.sink.write({
      type: 'span_end',
      timestamp: new Date().toISOString(),
      runId: this.runId,
      spanId: this.spanId,
      parentSpanId: this.parentSpanId,
      name,
      durationMs: Date.now() - startTs,
      ...(failure && { error: errorMessage(failure.error) }),
    });
  }

  event(name: string, metadata?: Record<string, unknown>): void {
    this.sink.write({
      type: 'event',
      timestamp: new Date().toISOString(),
      runId: this.runId,
      spanId: this.spanId,
      name,
      metadata,
    });
  }

  emit(event: TraceEvent): void {
    this.sink.write(event);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface TokenUsage {
  in?: number;
  out?: number;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ContentBlock {
  type: string;
  text?: string;
}

export type ChatContent = string | ContentBlock[];

export interface ChatResponse {
  text(): string;
}

/**
 * Assistant reply. `text()` returns string content as is, or the text blocks of
 * multi-part content concatenated in order.
 */
export class AIMessage implements ChatResponse {
  constructor(
    public readonly content: ChatContent,
    public readonly tokens?: TokenUsage
  ) {}

  text(): string {
    if (typeof this.content === 'string') return this.content;
    return this.content
      .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
      .join('');
  }
}

/**
 * Chat model capability. `invoke` occupies the caller until the reply is there,
 * `invokeAsync` hands control back to the event loop while the call is outstanding.
 */
export interface ChatModel {
  readonly name: string;
  invoke(messages: ChatMessage[]): ChatResponse;
  invokeAsync(messages: ChatMessage[]): Promise<ChatResponse>;
}

export interface Ctx {
  runId: RunId;
  spanId: SpanId;
  trace: Trace;
  span<T>(name: string, fn: (ctx: Ctx) => Promise<T>, meta?: Record<string, unknown>): Promise<T>;
  spanSync<T>(name: string, fn: (ctx: Ctx) => T, meta?: Record<string, unknown>): T;
}

export class RuntimeCtx implements Ctx {
  constructor(public readonly trace: Trace) {}

  get runId(): RunId {
    return this.trace.run;
  }

  get spanId(): SpanId {
    return this.trace.id;
  }

  span<T>(name: string, fn: (ctx: Ctx) => Promise<T>, meta?: Record<string, unknown>): Promise<T> {
    return this.trace.span(name, (child) => fn(new RuntimeCtx(child)), meta);
  }

  spanSync<T>(name: string, fn: (ctx: Ctx) => T, meta?: Record<string, unknown>): T {
    return this.trace.spanSync(name, (child) => fn(new RuntimeCtx(child)), meta);
  }
}

export class ValidationError extends Error {
  constructor(
    public readonly issues: z.ZodIssue[],
    message?: string
  ) {
    super(message ?? 'Validation failed');
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedInvocationError extends Error {
  constructor(model: string, mode: 'blocking' | 'suspending') {
    super(`Model ${model} does not support ${mode} invocation`);
    this.name = 'UnsupportedInvocationError';
  }
}

export type ValidationDirection = 'input' | 'state' | 'output';

export function validateWithZod<T>(
  schema: z.ZodType<T>,
  value: unknown,
  direction: ValidationDirection,
  ctx?: Ctx
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    ctx?.trace.emit({
      type: 'validation_error',
      timestamp: new Date().toISOString(),
      runId: ctx.runId,
      spanId: ctx.spanId,
      direction,
      issues: result.error.issues,
    });
    throw new ValidationError(result.error.issues, `${direction} validation failed`);
  }
  return result.data;
}

export const END = '__end__';
export type End = typeof END;

/**
 * A unit of work that reads the run state and returns a partial update.
 * Both forms must build the same request and return the same update.
 */
export interface Node<S, U extends Partial<S>> {
  name: string;
  run(state: S, ctx?: Ctx): U;
  runAsync(state: S, ctx?: Ctx): Promise<U>;
}

export function defineNode<S, U extends Partial<S>>(node: Node<S, U>): Node<S, U> {
  return node;
}

export interface WorkflowDefinition<S, I, O, U extends Partial<S>> {
  name: string;
  state: z.ZodType<S>;
  input: z.ZodType<I>;
  output: z.ZodType<O>;
  node: Node<S, U>;
}

export interface Workflow<I, O> {
  name: string;
  input: z.ZodType<I>;
  output: z.ZodType<O>;
  nodes: readonly string[];
  entryPoint: string;
  edges: ReadonlyArray<readonly [string, End]>;
  invoke(input: I, ctx?: Ctx): O;
  invokeAsync(input: I, ctx?: Ctx): Promise<O>;
}

/**
 * Compiles a single-node workflow: input view → fresh state → node → merged
 * state → output view. The node's update is merged into a copy, so the
 * caller's input is never touched.
 */
export function defineWorkflow<S, I, O, U extends Partial<S>>(
  definition: WorkflowDefinition<S, I, O, U>
): Workflow<I, O> {
  const { node } = definition;

  function start(input: I, ctx?: Ctx): S {
    const validatedInput = validateWithZod(definition.input, input, 'input', ctx);
    return validateWithZod(definition.state, validatedInput, 'state', ctx);
  }

  function finish(state: S, update: U, ctx?: Ctx): O {
    const merged = validateWithZod(definition.state, { ...state, ...update }, 'state', ctx);
    return validateWithZod(definition.output, merged, 'output', ctx);
  }

  function invokeBody(input: I, ctx?: Ctx): O {
    const state = start(input, ctx);
    const update = ctx ? ctx.spanSync(node.name, (nodeCtx) => node.run(state, nodeCtx)) : node.run(state);
    return finish(state, update, ctx);
  }

  async function invokeAsyncBody(input: I, ctx?: Ctx): Promise<O> {
    const state = start(input, ctx);
    const update = ctx ? await ctx.span(node.name, (nodeCtx) => node.runAsync(state, nodeCtx)) : await node.runAsync(state);
    return finish(state, update, ctx);
  }

  return {
    name: definition.name,
    input: definition.input,
    output: definition.output,
    nodes: [node.name],
    entryPoint: node.name,
    edges: [[node.name, END]],
    invoke(input: I, ctx?: Ctx): O {
      return ctx ? ctx.spanSync(definition.name, (spanCtx) => invokeBody(input, spanCtx)) : invokeBody(input);
    },
    invokeAsync(input: I, ctx?: Ctx): Promise<O> {
      return ctx ? ctx.span(definition.name, (spanCtx) => invokeAsyncBody(input, spanCtx)) : invokeAsyncBody(input);
    },
  };
}

export interface RunRecord {
  runId: RunId;
  target: string;
  status: 'success' | 'failure';
  startedAt: string;
  endedAt: string;
  durationMs: number;
}

export interface RunResult<O> {
  output: O;
  record: RunRecord;
}

export interface RuntimeOptions {
  trace?: { sink?: TraceSink; directory?: string };
}

export function createRuntime(options: RuntimeOptions = {}) {
  const traceDir = options.trace?.directory ?? path.join(process.cwd(), 'traces');

  function begin(name: string) {
    const runId = randomUUID();
    const ownsSink = !options.trace?.sink;
    const sink = options.trace?.sink ?? new JsonlTraceSink(path.join(traceDir, `${runId}.jsonl`));
    const rootSpanId = randomUUID();
    const trace = new Trace(runId, sink, rootSpanId);
    trace.emit({
      type: 'span_start',
      timestamp: new Date().toISOString(),
      runId,
      spanId: rootSpanId,
      name,
    });
    const startedAt = Date.now();

    function complete(failed: boolean, err?: unknown): RunRecord {
      trace.end(name, startedAt, failed ? { error: err } : undefined);
      try {
        if (ownsSink) sink.close();
      } catch (closeErr) {
        // a failed run surfaces its own error; a successful one fails on the sink
        if (!failed) throw closeErr;
      }
      return {
        runId,
        target: name,
        status: failed ? 'failure' : 'success',
        startedAt: new Date(startedAt).toISOString(),
        endedAt: new Date().toISOString(),
        durationMs: Date.now() - startedAt,
      };
    }

    return { ctx: new RuntimeCtx(trace), complete };
  }

  async function run<I, O>(target: Workflow<I, O>, input: I): Promise<RunResult<O>> {
    const { ctx, complete } = begin(target.name);
    let output: O;
    try {
      output = await target.invokeAsync(input, ctx);
    } catch (err) {
      complete(true, err);
      throw err;
    }
    return { output, record: complete(false) };
  }

  function runSync<I, O>(target: Workflow<I, O>, input: I): RunResult<O> {
    const { ctx, complete } = begin(target.name);
    let output: O;
    try {
      output = target.invoke(input, ctx);
    } catch (err) {
      complete(true, err);
      throw err;
    }
    return { output, record: complete(false) };
  }

  return { run, runSync };
}

export type Runtime = ReturnType<typeof createRuntime>;
