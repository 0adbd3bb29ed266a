import { describe, it, expect } from 'vitest';
import type { ChatChunk, LLMRequest, LLMResponse, Middleware } from '../types/index.js';
import { userMessage } from '../types/index.js';
import { chunk, textResponse } from '../testing/scripted-adapter.js';
import { executeMiddlewareChain } from './middleware.js';

const request: LLMRequest = { model: 'test-model', messages: [userMessage('hi')] };

function logging(log: Array<string>, name: string): Middleware {
  return (req, next) => {
    log.push(`${name}-before`);
    const result = next(req);
    if (result instanceof Promise) {
      return result.then((response) => {
        log.push(`${name}-after`);
        return response;
      });
    }
    return result;
  };
}

describe('executeMiddlewareChain', () => {
  it('runs request phases first to last and response phases last to first', async () => {
    const log: Array<string> = [];

    const result = executeMiddlewareChain([logging(log, 'outer'), logging(log, 'inner')], request, async () => {
      log.push('handler');
      return textResponse('done');
    });
    await result;

    expect(log).toEqual(['outer-before', 'inner-before', 'handler', 'inner-after', 'outer-after']);
  });

  it('calls the handler directly without middleware', async () => {
    const response = await executeMiddlewareChain([], request, async (req) => textResponse(req.model));

    expect(response).toMatchObject({ content: [{ kind: 'TEXT', text: 'test-model' }] });
  });

  it('lets middleware rewrite the request', async () => {
    const rewrite: Middleware = (req, next) => next({ ...req, temperature: 0 });
    let seen: LLMRequest | null = null;

    await executeMiddlewareChain([rewrite], request, async (req) => {
      seen = req;
      return textResponse('ok');
    });

    expect(seen).toMatchObject({ temperature: 0 });
  });

  it('lets middleware transform streamed chunks', async () => {
    const upper: Middleware = (req, next) => {
      const inner = next(req);
      if (inner instanceof Promise) {
        return inner;
      }
      return (async function* () {
        for await (const item of inner) {
          yield {
            ...item,
            choices: item.choices.map((choice) => ({
              ...choice,
              delta: { ...choice.delta, content: choice.delta.content?.toUpperCase() },
            })),
          };
        }
      })();
    };

    const result = executeMiddlewareChain([upper], request, () =>
      (async function* (): AsyncGenerator<ChatChunk> {
        yield chunk({ content: 'abc' });
      })(),
    );

    const contents: Array<string | undefined> = [];
    if (!(result instanceof Promise)) {
      for await (const item of result) {
        contents.push(item.choices[0]?.delta.content);
      }
    }
    expect(contents).toEqual(['ABC']);
  });

  it('can short-circuit without calling the handler', async () => {
    const cached: LLMResponse = textResponse('cached');
    const cache: Middleware = () => Promise.resolve(cached);
    let called = false;

    const response = await executeMiddlewareChain([cache], request, async () => {
      called = true;
      return textResponse('fresh');
    });

    expect(response).toBe(cached);
    expect(called).toBe(false);
  });
});
