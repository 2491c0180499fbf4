import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AIMessage, ChatMessage, ChatModel, MemoryTraceSink, RuntimeCtx, Trace, TraceEvent, TraceSink } from '@docsum/core';
import { ProgrammableChatModel, createStaticChatModel } from '@docsum/llm';
import { createSummarizationNode } from './node.js';
import { DEFAULT_SYSTEM_PROMPT } from './prompt.js';

const state = { documents: [{ content: 'A' }, { content: 'B' }] };

describe('createSummarizationNode', () => {
  it('is named summarize by default', () => {
    assert.equal(createSummarizationNode({ model: createStaticChatModel('S') }).name, 'summarize');
    assert.equal(createSummarizationNode({ model: createStaticChatModel('S'), name: 'digest' }).name, 'digest');
  });

  it('returns the model text as a summary update', () => {
    const node = createSummarizationNode({ model: createStaticChatModel('S') });
    assert.deepEqual(node.run(state), { summary: 'S' });
  });

  it('builds the same prompt and summary on both paths', async () => {
    const model = createStaticChatModel('S');
    const node = createSummarizationNode({ model, prompt: 'Be terse.' });

    const blocking = node.run(state);
    const suspending = await node.runAsync(state);

    assert.deepEqual(blocking, suspending);
    assert.equal(model.calls.length, 2);
    assert.deepEqual(model.calls[0], model.calls[1]);
    assert.deepEqual(model.calls[0], [
      { role: 'system', content: 'Be terse.' },
      { role: 'user', content: 'A---\n\nB' },
    ]);
  });

  it('calls the model exactly once per invocation', async () => {
    const model = createStaticChatModel('S');
    const node = createSummarizationNode({ model });
    await node.runAsync(state);
    assert.equal(model.calls.length, 1);
  });

  it('does not touch the input state', () => {
    const input = { documents: [{ content: 'A' }] };
    createSummarizationNode({ model: createStaticChatModel('S') }).run(input);
    assert.deepEqual(input, { documents: [{ content: 'A' }] });
  });

  it('passes model errors through unmodified', async () => {
    const error = new Error('rate limited');
    const model = new ProgrammableChatModel({
      responder: () => {
        throw error;
      },
      asyncResponder: async () => {
        throw error;
      },
    });
    const node = createSummarizationNode({ model });

    assert.throws(
      () => node.run(state),
      (err) => err === error
    );
    await assert.rejects(node.runAsync(state), (err) => err === error);
    assert.equal(model.calls.length, 2);
  });

  it('surfaces extraction failures from the response', () => {
    const extractionError = new TypeError('no text');
    const model: ChatModel = {
      name: 'broken',
      invoke: () => ({
        text(): string {
          throw extractionError;
        },
      }),
      invokeAsync: async () => new AIMessage('unused'),
    };
    assert.throws(
      () => createSummarizationNode({ model }).run(state),
      (err) => err === extractionError
    );
  });

  it('records the model call when traced', () => {
    const sink = new MemoryTraceSink();
    const ctx = new RuntimeCtx(new Trace('run-1', sink, 'span-1'));
    const model = new ProgrammableChatModel({
      name: 'stub',
      responder: (messages: ChatMessage[]) => ({ content: `${messages.length} messages`, tokens: { in: 7, out: 2 } }),
    });

    createSummarizationNode({ model }).run(state, ctx);

    const [call] = sink.ofType('llm_call');
    assert.equal(call?.model, 'stub');
    assert.equal(call?.messages, 2);
    assert.equal(call?.raw, '2 messages');
    assert.deepEqual(call?.tokens, { in: 7, out: 2 });
    assert.equal(call?.spanId, 'span-1');
  });

  it('records the error of a failed traced call', async () => {
    const sink = new MemoryTraceSink();
    const ctx = new RuntimeCtx(new Trace('run-1', sink, 'span-1'));
    const model = new ProgrammableChatModel({
      responder: () => {
        throw new Error('offline');
      },
    });

    await assert.rejects(createSummarizationNode({ model }).runAsync(state, ctx), /offline/);
    assert.equal(sink.ofType('llm_call')[0]?.error, 'offline');
  });

  it('uses the default system prompt when none is configured', () => {
    const model = createStaticChatModel('S');
    createSummarizationNode({ model }).run(state);
    assert.equal(model.calls[0]?.[0]?.content, DEFAULT_SYSTEM_PROMPT);
  });

  it('lets a failing trace sink surface without recording a second call', async () => {
    const sinkError = new Error('disk full');
    const attempts: TraceEvent[] = [];
    const sink: TraceSink = {
      write(event) {
        if (event.type !== 'llm_call') return;
        attempts.push(event);
        throw sinkError;
      },
      close() {},
    };
    const ctx = new RuntimeCtx(new Trace('run-1', sink, 'span-1'));
    const node = createSummarizationNode({ model: createStaticChatModel('S') });

    assert.throws(
      () => node.run(state, ctx),
      (err) => err === sinkError
    );
    await assert.rejects(node.runAsync(state, ctx), (err) => err === sinkError);
    assert.equal(attempts.length, 2);
    assert.deepEqual(
      attempts.map((event) => ('error' in event ? event.error : undefined)),
      [undefined, undefined]
    );
  });
});
