import { describe, it, expect } from 'vitest';
import { buildCurlCommand } from '../../utils/curl';

describe('buildCurlCommand', () => {
  it('builds a POST command with headers and body', () => {
    const result = buildCurlCommand(
      'post',
      'http://localhost:8080/v1/messages',
      { 'content-type': 'application/json', 'anthropic-version': '2023-06-01' },
      '{"model":"claude-sonnet-4-20250514","stream":true}',
    );

    expect(result).toBe(
      "curl -X POST 'http://localhost:8080/v1/messages'" +
        " -H 'content-type: application/json'" +
        " -H 'anthropic-version: 2023-06-01'" +
        ` -d '{"model":"claude-sonnet-4-20250514","stream":true}'`,
    );
  });

  it('redacts credentials', () => {
    const result = buildCurlCommand('POST', 'http://localhost/v1/messages', {
      'x-api-key': 'test-secret',
      Authorization: 'Bearer test-secret',
    });

    expect(result).toBe(
      "curl -X POST 'http://localhost/v1/messages'" +
        " -H 'x-api-key: [REDACTED]'" +
        " -H 'Authorization: [REDACTED]'",
    );
  });

  it('excludes hop-by-hop and length headers', () => {
    const result = buildCurlCommand('GET', 'http://localhost/v1/models', {
      host: 'localhost',
      connection: 'keep-alive',
      'content-length': '123',
      'Transfer-Encoding': 'chunked',
      accept: 'application/json',
    });

    expect(result).toBe("curl -X GET 'http://localhost/v1/models' -H 'accept: application/json'");
  });

  it('escapes single quotes', () => {
    const result = buildCurlCommand(
      'POST',
      "http://localhost/v1/messages?q=it's",
      { 'x-note': "don't" },
      `{"text":"it's"}`,
    );

    expect(result).toBe(
      "curl -X POST 'http://localhost/v1/messages?q=it'\\''s'" +
        " -H 'x-note: don'\\''t'" +
        ` -d '{"text":"it'\\''s"}'`,
    );
  });

  it('omits an empty body', () => {
    expect(buildCurlCommand('POST', 'http://localhost/', {}, '')).toBe("curl -X POST 'http://localhost/'");
  });
});
