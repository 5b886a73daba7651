import { describe, it, expect, vi } from 'vitest';
import { createBackend, parseDomainList, PASTEBIN_API_ENDPOINT } from '../backends.ts';
import { ConfigurationError } from '../errors.ts';
import { createSilentLogger } from '../logger.ts';
import type { PostForm } from '../http.ts';

const logger = createSilentLogger();
const env = {
  PASTEBIN_USERKEY: 'test-user-key',
  PASTEBIN_DEVKEY: 'test-dev-key',
  PASTEBIN_PASTEID: 'test-paste',
};

describe('parseDomainList', () => {
  it('should return the strings under check_ssl', () => {
    expect(parseDomainList('{"check_ssl": ["a.example.com", "b.example.com", 42]}')).toEqual([
      'a.example.com',
      'b.example.com',
    ]);
  });

  it('should refuse invalid JSON', () => {
    expect(() => parseDomainList('<html>')).toThrow(ConfigurationError);
  });

  it('should refuse a payload without the list', () => {
    expect(() => parseDomainList('{"domains": []}')).toThrow("Domain list has no 'check_ssl' key");
    expect(() => parseDomainList('{"check_ssl": "a.example.com"}')).toThrow("Domain list 'check_ssl' is not an array");
  });
});

describe('createBackend', () => {
  it('should refuse unknown backends', () => {
    expect(() => createBackend('gcs', { env, logger })).toThrow("Unknown backend 'gcs'. Available: pastebin");
  });

  it('should require every pastebin credential', () => {
    expect(() => createBackend('pastebin', { env: {}, logger })).toThrow('PASTEBIN_USERKEY not set!');
    expect(() => createBackend('pastebin', { env: { ...env, PASTEBIN_DEVKEY: '' }, logger })).toThrow(
      'PASTEBIN_DEVKEY not set!'
    );
    expect(() => createBackend('pastebin', { env: { ...env, PASTEBIN_PASTEID: undefined }, logger })).toThrow(
      'PASTEBIN_PASTEID not set!'
    );
  });

  it('should post the paste request and return its domains', async () => {
    const postForm = vi.fn<PostForm>().mockResolvedValue({
      statusCode: 200,
      body: '{"check_ssl": ["a.example.com", "b.example.com"]}',
    });

    const backend = createBackend('pastebin', { env, logger, postForm });

    expect(backend.name).toBe('pastebin');
    expect(await backend.fetch()).toEqual(['a.example.com', 'b.example.com']);
    expect(postForm).toHaveBeenCalledWith(
      PASTEBIN_API_ENDPOINT,
      {
        api_option: 'show_paste',
        api_user_key: 'test-user-key',
        api_dev_key: 'test-dev-key',
        api_paste_key: 'test-paste',
      },
      expect.objectContaining({ timeout: 30000 })
    );
  });

  it('should fail on an error status', async () => {
    const postForm = vi.fn<PostForm>().mockResolvedValue({ statusCode: 403, body: 'Bad API request' });

    await expect(createBackend('pastebin', { env, logger, postForm }).fetch()).rejects.toThrow(
      'Pastebin responded with status 403'
    );
  });

  it('should fail when pastebin cannot be reached', async () => {
    const postForm = vi.fn<PostForm>().mockRejectedValue(new Error('getaddrinfo ENOTFOUND pastebin.com'));

    await expect(createBackend('pastebin', { env, logger, postForm }).fetch()).rejects.toThrow(
      "Can't reach pastebin: getaddrinfo ENOTFOUND pastebin.com"
    );
  });
});
