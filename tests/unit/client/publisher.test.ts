import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ChatCompletionsClient } from '../../../src/client/chat-completions-client.js';
import { SingleValuePublisher } from '../../../src/client/publisher.js';
import { ApiError } from '../../../src/errors.js';
import { createLogger } from '../../../src/logger.js';
import type { HttpResponse } from '../../../src/transport/types.js';
import { ScriptedTransport, jsonResponse } from '../../helpers/scripted-transport.js';
import { TEST_API_KEY, mockChatRequest, mockErrorBody, mockSuccessBody } from '../../helpers/fixtures.js';

const silentLogger = createLogger('silent');

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

// Let queued promise reactions run
const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('SingleValuePublisher', () => {
  it('delivers one value then completes', async () => {
    const task = deferred<number>();
    const publisher = new SingleValuePublisher(task.promise, silentLogger);
    const events: string[] = [];

    publisher.subscribe({
      next: (value) => events.push(`next:${value}`),
      error: () => events.push('error'),
      complete: () => events.push('complete'),
    });

    task.resolve(42);
    await flush();

    expect(events).toEqual(['next:42', 'complete']);
  });

  it('delivers one error and no value', async () => {
    const task = deferred<number>();
    const publisher = new SingleValuePublisher(task.promise, silentLogger);
    const failure = new Error('boom');
    const next = vi.fn();
    const complete = vi.fn();
    const error = vi.fn();

    publisher.subscribe({ next, error, complete });
    task.reject(failure);
    await flush();

    expect(next).not.toHaveBeenCalled();
    expect(complete).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(failure);
  });

  it('stops delivery after unsubscribe', async () => {
    const task = deferred<number>();
    const publisher = new SingleValuePublisher(task.promise, silentLogger);
    const next = vi.fn();

    const unsubscribe = publisher.subscribe({ next });
    unsubscribe();
    task.resolve(1);
    await flush();

    expect(next).not.toHaveBeenCalled();
    expect(publisher.settled).toBe(true);
  });

  it('replays the settled outcome to late subscribers', async () => {
    const publisher = new SingleValuePublisher(Promise.resolve('done'), silentLogger);
    await flush();

    const next = vi.fn();
    publisher.subscribe({ next });

    expect(next).toHaveBeenCalledWith('done');
  });

  it('keeps delivering when one subscriber throws', async () => {
    const task = deferred<string>();
    const publisher = new SingleValuePublisher(task.promise, silentLogger);
    const next = vi.fn();

    publisher.subscribe({
      next: () => {
        throw new Error('subscriber bug');
      },
    });
    publisher.subscribe({ next });
    task.resolve('value');
    await flush();

    expect(next).toHaveBeenCalledWith('value');
  });
});

describe('ChatCompletionsClient.createChatCompletionPublisher', () => {
  let transport: ScriptedTransport;
  let client: ChatCompletionsClient;

  beforeEach(() => {
    transport = new ScriptedTransport();
    client = new ChatCompletionsClient({ apiKey: TEST_API_KEY, transport, logger: silentLogger });
  });

  it('emits the response and completes', async () => {
    transport.handler = () => jsonResponse(200, mockSuccessBody({ content: 'Hello from publisher' }));
    const contents: string[] = [];
    const complete = vi.fn();

    client.createChatCompletionPublisher(mockChatRequest()).subscribe({
      next: (response) => contents.push(response.choices[0]?.message.content ?? ''),
      complete,
    });
    await flush();

    expect(contents).toEqual(['Hello from publisher']);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('completes with the API error', async () => {
    transport.handler = () => jsonResponse(401, mockErrorBody());
    const error = vi.fn();

    client.createChatCompletionPublisher(mockChatRequest()).subscribe({ error });
    await flush();

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[0]).toBeInstanceOf(ApiError);
  });

  it('lets the exchange finish after the subscriber cancels', async () => {
    const response = deferred<HttpResponse>();
    transport.handler = () => response.promise;
    const next = vi.fn();

    const publisher = client.createChatCompletionPublisher(mockChatRequest());
    const unsubscribe = publisher.subscribe({ next });
    await flush();
    unsubscribe();

    response.resolve(jsonResponse(200, mockSuccessBody()));
    await flush();

    expect(transport.requests).toHaveLength(1);
    expect(publisher.settled).toBe(true);
    expect(next).not.toHaveBeenCalled();
  });
});
