import type { Dispatcher, Tracer } from '@dispatch-perf/types';
import { captureTrace } from './trace-capture';

interface TraceHandle {
  id: string;
}

function recordingTracer(calls: string[], enabled = true) {
  const tracer: Tracer<string, TraceHandle> & {
    recordException: jest.Mock;
  } = {
    startTrace: (request: string) => {
      calls.push(`start:${request}`);
      return enabled ? { id: 'trace-1' } : undefined;
    },
    recordException: jest.fn((error: unknown) => {
      calls.push(`exception:${error instanceof Error ? error.message : String(error)}`);
    }),
    completeTrace: (success: boolean) => {
      calls.push(`complete:${success}`);
    },
  };
  return tracer;
}

describe('captureTrace', () => {
  it('should start, send and complete in order', async () => {
    const calls: string[] = [];
    const dispatcher: Dispatcher<string, string> = {
      send: async (request) => {
        calls.push(`send:${request}`);
        return 'pong';
      },
    };

    const result = await captureTrace(dispatcher, recordingTracer(calls), 'ping');

    expect(result).toEqual({ response: 'pong', trace: { id: 'trace-1' } });
    expect(calls).toEqual(['start:ping', 'send:ping', 'complete:true']);
  });

  it('should record the failure and rethrow the same error', async () => {
    const calls: string[] = [];
    const failure = new Error('handler failed');
    const tracer = recordingTracer(calls);
    const dispatcher: Dispatcher<string, string> = {
      send: async () => {
        throw failure;
      },
    };

    await expect(captureTrace(dispatcher, tracer, 'ping')).rejects.toBe(failure);
    expect(tracer.recordException).toHaveBeenCalledWith(failure);
    expect(calls).toEqual(['start:ping', 'exception:handler failed', 'complete:false']);
  });

  it('should surface the dispatch error when the tracer throws', async () => {
    const failure = new Error('handler failed');
    const completeTrace = jest.fn(() => {
      throw new Error('tracer completion failed');
    });
    const tracer: Tracer<string, TraceHandle> = {
      startTrace: () => ({ id: 'trace-1' }),
      recordException: () => {
        throw new Error('tracer export failed');
      },
      completeTrace,
    };
    const dispatcher: Dispatcher<string, string> = {
      send: async () => {
        throw failure;
      },
    };

    await expect(captureTrace(dispatcher, tracer, 'ping')).rejects.toBe(failure);
    expect(completeTrace).toHaveBeenCalledWith(false);
  });

  it('should return an undefined handle when tracing is disabled', async () => {
    const dispatcher: Dispatcher<string, string> = { send: async () => 'pong' };

    const result = await captureTrace(dispatcher, recordingTracer([], false), 'ping');

    expect(result.response).toBe('pong');
    expect(result.trace).toBeUndefined();
  });

  it('should pass the signal to the dispatcher', async () => {
    const send = jest.fn(async (_request: string, _signal?: AbortSignal) => 'pong');
    const controller = new AbortController();

    await captureTrace({ send }, recordingTracer([]), 'ping', controller.signal);

    expect(send).toHaveBeenCalledWith('ping', controller.signal);
  });
});
