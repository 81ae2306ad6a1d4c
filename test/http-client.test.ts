import { basicAuthHeader, createFetchWithTimeout } from '../src/utils/http-client.js';
import { createCommandRasterProcessor } from '../src/utils/raster-processor.js';
import type { RunCommand } from '../src/utils/process.js';

const waitForAbort = async (_url: string, init?: RequestInit): Promise<Response> =>
  new Promise((_resolve, reject) => {
    if (init?.signal?.aborted) {
      reject(new Error('aborted'));
      return;
    }
    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

describe('createFetchWithTimeout', () => {
  test('aborts a request that outlives the timeout', async () => {
    const fetchWithTimeout = createFetchWithTimeout(10, waitForAbort);
    await expect(fetchWithTimeout('https://archive.test/')).rejects.toThrow('aborted');
  });

  test('follows an upstream abort signal', async () => {
    const fetchWithTimeout = createFetchWithTimeout(0, waitForAbort);
    const upstream = new AbortController();
    upstream.abort();
    await expect(fetchWithTimeout('https://archive.test/', { signal: upstream.signal })).rejects.toThrow('aborted');
  });

  test('returns the response when it arrives in time', async () => {
    const fetchWithTimeout = createFetchWithTimeout(1000, async () => new Response('ok'));
    expect(await (await fetchWithTimeout('https://archive.test/')).text()).toBe('ok');
  });
});

test('basicAuthHeader encodes the credentials', () => {
  expect(basicAuthHeader('user', 'test-secret')).toBe(`Basic ${Buffer.from('user:test-secret').toString('base64')}`);
});

test('createCommandRasterProcessor renders the bounding box and paths into the arguments', async () => {
  const runCommand = vi.fn<RunCommand>(async () => ({ stdout: '', stderr: '' }));
  const processor = createCommandRasterProcessor({
    command: 'gdalwarp',
    args: ['-te', '{XMIN}', '{YMIN}', '{XMAX}', '{YMAX}', '{INPUT}', '{OUTPUT}'],
    runCommand,
  });

  await processor.process({ source: '/tmp/in.tif', destination: '/tmp/out.tif', boundingBox: { xmin: -3.5, xmax: 1.5, ymin: 4.5, ymax: 11.5 } });

  expect(runCommand).toHaveBeenCalledWith('gdalwarp', ['-te', '-3.5', '4.5', '1.5', '11.5', '/tmp/in.tif', '/tmp/out.tif']);
});
