import { describe, it, expect } from 'vitest';
import { TaskBuildError } from '../errors.js';
import { buildTask } from './task-builder.js';

describe('buildTask', () => {
  it('applies defaults', () => {
    expect(buildTask('https://api.test/items')).toEqual({
      method: 'get',
      url: 'https://api.test/items',
      body: undefined,
      headers: {},
      responseDecoding: 'json',
      timeoutMs: undefined,
      doNotWait: false,
      numRetries: -1,
      failSilently: false,
    });
  });

  it('serializes an object body and detects the JSON content type', () => {
    const task = buildTask('https://api.test/items', {
      method: 'POST',
      body: { name: 'widget', count: 2 },
    });

    expect(task.method).toBe('post');
    expect(task.headers).toEqual({ 'content-type': 'application/json' });
    expect(task.body).toBe('{"name":"widget","count":2}');
  });

  it('marks string bodies as text/html and sends them as given', () => {
    const task = buildTask('https://api.test/render', {
      method: 'put',
      body: '<p>hello</p>',
    });

    expect(task.headers).toEqual({ 'content-type': 'text/html' });
    expect(task.body).toBe('<p>hello</p>');
  });

  it('keeps an explicit content type whatever its case', () => {
    const task = buildTask('https://api.test/items', {
      method: 'post',
      headers: { 'Content-Type': 'text/plain' },
      body: { a: 1 },
    });

    expect(task.headers).toEqual({ 'Content-Type': 'text/plain' });
    expect(task.body).toBe('{"a":1}');
  });

  it('skips content type detection when disabled', () => {
    const task = buildTask('https://api.test/items', {
      method: 'post',
      body: { a: 1 },
      autodetectContentType: false,
    });

    expect(task.headers).toEqual({});
    expect(task.body).toBe('{"a":1}');
  });

  it('passes binary payloads through untouched', () => {
    const payload = Buffer.from([1, 2, 3]);
    const task = buildTask('https://api.test/upload', {
      method: 'post',
      body: payload,
    });

    expect(task.body).toBe(payload);
    expect(task.headers).toEqual({});
  });

  it('treats a null body as no payload', () => {
    const task = buildTask('https://api.test/items', { body: null });

    expect(task.body).toBeUndefined();
    expect(task.headers).toEqual({});
  });

  it('uses a custom encoder for non-payload bodies', () => {
    const task = buildTask('https://api.test/items', {
      method: 'post',
      body: { id: 1 },
      encoder: (value) => `encoded:${JSON.stringify(value)}`,
    });

    expect(task.body).toBe('encoded:{"id":1}');
  });

  it('sets only the api-key header for an api key', () => {
    const task = buildTask('https://api.test/items', { apiKey: 'test-key' });

    expect(task.headers).toEqual({ 'api-key': 'test-key' });
  });

  it('replaces any case variant of the api-key header', () => {
    const task = buildTask('https://api.test/items', {
      headers: { 'API-Key': 'stale', accept: 'application/json' },
      apiKey: 'test-key',
    });

    expect(task.headers).toEqual({
      accept: 'application/json',
      'api-key': 'test-key',
    });
  });

  it('sets accept-language from the language code', () => {
    const task = buildTask('https://api.test/items', {
      headers: { 'Accept-Language': 'en' },
      languageCode: 'es-ES',
    });

    expect(task.headers).toEqual({ 'accept-language': 'es-ES' });
  });

  it('renders boolean query values as True/False', () => {
    expect(
      buildTask('https://api.test/items', { query: { key: true } }).url,
    ).toBe('https://api.test/items?key=True');
    expect(
      buildTask('https://api.test/items', { query: { key: false } }).url,
    ).toBe('https://api.test/items?key=False');
  });

  it('merges the query into an existing query string', () => {
    const task = buildTask('https://api.test/items?page=1&sort=asc', {
      query: { page: 2, tags: ['a', 'b'], skipped: undefined, empty: null },
    });

    expect(task.url).toBe(
      'https://api.test/items?sort=asc&page=2&tags=a&tags=b&empty=',
    );
  });

  it('does not modify the caller headers', () => {
    const headers = { 'X-Trace': 'abc' };
    buildTask('https://api.test/items', {
      headers,
      apiKey: 'test-key',
      body: { a: 1 },
    });

    expect(headers).toEqual({ 'X-Trace': 'abc' });
  });

  it('returns a frozen descriptor', () => {
    const task = buildTask('https://api.test/items', { apiKey: 'test-key' });

    expect(Object.isFrozen(task)).toBe(true);
    expect(Object.isFrozen(task.headers)).toBe(true);
  });

  it('carries the retry and delivery options', () => {
    const task = buildTask('https://api.test/items', {
      timeoutMs: 2_500,
      numRetries: 3,
      failSilently: true,
      doNotWait: true,
      responseDecoding: 'raw',
    });

    expect(task).toMatchObject({
      timeoutMs: 2_500,
      numRetries: 3,
      failSilently: true,
      doNotWait: true,
      responseDecoding: 'raw',
    });
  });

  it('rejects relative URLs', () => {
    expect(() => buildTask('/items')).toThrow(TaskBuildError);
    expect(() => buildTask('/items')).toThrow(
      'Cannot build task for url "/items": not an absolute URL',
    );
  });

  it('rejects timeouts that are not positive integers', () => {
    expect(() => buildTask('https://api.test/items', { timeoutMs: 0 })).toThrow(TaskBuildError);
    expect(() => buildTask('https://api.test/items', { timeoutMs: Number.NaN })).toThrow(
      'Cannot build task for url "https://api.test/items": timeoutMs must be a positive integer, got NaN',
    );
    expect(() => buildTask('https://api.test/items', { timeoutMs: 12.5 })).toThrow(TaskBuildError);
  });

  it('rejects retry counts that are fractional or below -1', () => {
    expect(() => buildTask('https://api.test/items', { numRetries: 1.5 })).toThrow(
      'Cannot build task for url "https://api.test/items": numRetries must be an integer >= -1, got 1.5',
    );
    expect(() => buildTask('https://api.test/items', { numRetries: -2 })).toThrow(TaskBuildError);
    expect(buildTask('https://api.test/items', { numRetries: -1 }).numRetries).toBe(-1);
    expect(buildTask('https://api.test/items', { numRetries: 0 }).numRetries).toBe(0);
  });
});
