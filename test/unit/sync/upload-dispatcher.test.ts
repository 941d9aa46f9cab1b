import { describe, it, expect, vi } from 'vitest';
import { UploadDispatcher, buildTargetUrl, type FetchLike } from '../../../src/sync/upload-dispatcher.js';
import { DispatchError } from '../../../src/core/errors.js';
import type { DispatchOutcome, Endpoint, UploadJob } from '../../../src/sync/types.js';
import { createStubFetch } from '../../helpers/stub-fetch.js';

const ENDPOINT: Endpoint = { host: '10.0.0.5', port: 4000, pathTemplate: '/upload' };

const PHOTO_JOB: UploadJob = {
  id: 'job-photo',
  source: 'photo',
  contentKind: 'raw-binary',
  payload: new Uint8Array([0xff, 0xd8, 0xff]),
  fileName: 'IMG_0001.jpg',
  pathSuffix: '/upload',
  createdAt: 1000,
};

const SMS_JOB: UploadJob = {
  id: 'job-sms',
  source: 'sms',
  contentKind: 'json',
  payload: { sender: '+15550100', content: 'Your code is 482913', code: '482913' },
  pathSuffix: '/sms',
  createdAt: 1000,
};

const CLIP_JOB: UploadJob = {
  id: 'job-clip',
  source: 'clipboard',
  contentKind: 'json',
  payload: { text: 'hello', timestamp: 1234 },
  pathSuffix: '/clipboard',
  createdAt: 1000,
};

function setup(endpoint: Endpoint | null = ENDPOINT) {
  const stub = createStubFetch();
  const outcomes: DispatchOutcome[] = [];
  const dispatcher = new UploadDispatcher({
    endpoint: () => endpoint,
    sink: (outcome) => outcomes.push(outcome),
    fetch: stub.fetch,
  });
  return { stub, outcomes, dispatcher };
}

describe('buildTargetUrl', () => {
  it('should swap the upload tail for the job suffix', () => {
    expect(buildTargetUrl(ENDPOINT, '/upload')).toBe('http://10.0.0.5:4000/upload');
    expect(buildTargetUrl(ENDPOINT, '/sms')).toBe('http://10.0.0.5:4000/sms');
    expect(buildTargetUrl(ENDPOINT, '/clipboard')).toBe('http://10.0.0.5:4000/clipboard');
  });

  it('should append the suffix to other templates', () => {
    expect(buildTargetUrl({ ...ENDPOINT, pathTemplate: '/relay/' }, '/sms')).toBe('http://10.0.0.5:4000/relay/sms');
    expect(buildTargetUrl({ ...ENDPOINT, pathTemplate: '/api/upload' }, '/sms')).toBe('http://10.0.0.5:4000/api/sms');
  });
});

describe('UploadDispatcher', () => {
  // ── Wire format ──

  it('should post photos as multipart with a data field', async () => {
    const { stub, outcomes, dispatcher } = setup();

    dispatcher.send(PHOTO_JOB);
    await dispatcher.drain();

    expect(stub.requests).toHaveLength(1);
    const { url, init } = stub.requests[0];
    expect(url).toBe('http://10.0.0.5:4000/upload');
    expect(init.method).toBe('POST');
    expect(init.body).toBeInstanceOf(FormData);

    const form = init.body instanceof FormData ? init.body : new FormData();
    const part = form.get('data');
    if (!(part instanceof Blob)) throw new Error('expected a file part');
    expect('name' in part ? part.name : undefined).toBe('IMG_0001.jpg');
    expect(part.type).toBe('application/octet-stream');
    expect(new Uint8Array(await part.arrayBuffer())).toEqual(new Uint8Array([0xff, 0xd8, 0xff]));

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]).toMatchObject({ jobId: 'job-photo', status: 'delivered', httpStatus: 200 });
  });

  it('should post sms as json', async () => {
    const { stub, dispatcher } = setup();

    dispatcher.send(SMS_JOB);
    await dispatcher.drain();

    const { url, init } = stub.requests[0];
    expect(url).toBe('http://10.0.0.5:4000/sms');
    expect(init.headers).toEqual({ 'content-type': 'application/json; charset=utf-8' });
    expect(init.body).toBe('{"sender":"+15550100","content":"Your code is 482913","code":"482913"}');
  });

  it('should post clipboard text as json', async () => {
    const { stub, dispatcher } = setup();

    dispatcher.send(CLIP_JOB);
    await dispatcher.drain();

    expect(stub.requests[0].url).toBe('http://10.0.0.5:4000/clipboard');
    expect(stub.requests[0].init.body).toBe('{"text":"hello","timestamp":1234}');
  });

  it('should read the endpoint at send time', async () => {
    let endpoint: Endpoint = ENDPOINT;
    const stub = createStubFetch();
    const dispatcher = new UploadDispatcher({ endpoint: () => endpoint, fetch: stub.fetch });

    dispatcher.send(SMS_JOB);
    endpoint = { host: '10.0.0.6', port: 3000, pathTemplate: '/upload' };
    dispatcher.send(SMS_JOB);
    await dispatcher.drain();

    expect(stub.requests.map(r => r.url)).toEqual(['http://10.0.0.5:4000/sms', 'http://10.0.0.6:3000/sms']);
  });

  // ── Failures ──

  it('should drop jobs when no endpoint is known', async () => {
    const { stub, outcomes, dispatcher } = setup(null);

    dispatcher.send(PHOTO_JOB);
    await dispatcher.drain();

    expect(stub.requests).toHaveLength(0);
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]).toMatchObject({ jobId: 'job-photo', url: null, status: 'dropped', durationMs: 0 });
    expect(outcomes[0].error).toBeInstanceOf(DispatchError);
  });

  it('should report non-2xx answers as rejected', async () => {
    const { stub, outcomes, dispatcher } = setup();
    stub.respondWith(500);

    dispatcher.send(SMS_JOB);
    await dispatcher.drain();

    expect(outcomes[0].status).toBe('rejected');
    expect(outcomes[0].httpStatus).toBe(500);
    expect(outcomes[0].error?.message).toBe('Receiver answered 500');
  });

  it('should report network errors as failed without throwing', async () => {
    const { stub, outcomes, dispatcher } = setup();
    stub.failWith(new Error('connect ECONNREFUSED 10.0.0.5:4000'));

    expect(() => dispatcher.send(CLIP_JOB)).not.toThrow();
    await dispatcher.drain();

    expect(outcomes[0].status).toBe('failed');
    expect(outcomes[0].error?.message).toBe(
      'Upload to http://10.0.0.5:4000/clipboard failed: connect ECONNREFUSED 10.0.0.5:4000',
    );
  });

  it('should abort requests that exceed the timeout', async () => {
    const hanging: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const outcomes: DispatchOutcome[] = [];
    const dispatcher = new UploadDispatcher({
      endpoint: () => ENDPOINT,
      sink: (outcome) => outcomes.push(outcome),
      fetch: hanging,
      timeoutMs: 20,
    });

    dispatcher.send(SMS_JOB);
    expect(dispatcher.inFlight).toBe(1);
    await dispatcher.drain();

    expect(dispatcher.inFlight).toBe(0);
    expect(outcomes[0].status).toBe('failed');
    expect(outcomes[0].error?.message).toBe('Upload to http://10.0.0.5:4000/sms failed: timed out after 20ms');
  });

  it('should not retry failed uploads', async () => {
    const { stub, dispatcher } = setup();
    stub.respondWith(503);

    dispatcher.send(SMS_JOB);
    await dispatcher.drain();

    expect(stub.requests).toHaveLength(1);
  });

  it('should keep working when the sink throws', async () => {
    const stub = createStubFetch();
    const sink = vi.fn(() => { throw new Error('sink broke'); });
    const dispatcher = new UploadDispatcher({ endpoint: () => ENDPOINT, sink, fetch: stub.fetch });

    dispatcher.send(SMS_JOB);
    dispatcher.send(CLIP_JOB);
    await dispatcher.drain();

    expect(sink).toHaveBeenCalledTimes(2);
  });
});
