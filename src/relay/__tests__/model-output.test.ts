import { describe, it, expect } from 'vitest';
import { MalformedModelOutputError } from '../../errors.js';
import { parseModelOutput, stripCodeFences } from '../model-output.js';

const REPLY = '{"url": "http://localhost:3001", "endpoint": "/students/fetch_daily_use_for_country", "params": {"country": "Spain"}}';

describe('stripCodeFences', () => {
  it('removes a json fence', () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('removes a bare fence', () => {
    expect(stripCodeFences('  ```\n[1]\n```  \n')).toBe('[1]');
  });

  it('leaves unfenced text alone', () => {
    expect(stripCodeFences(' {"a": 1} ')).toBe('{"a": 1}');
  });
});

describe('parseModelOutput', () => {
  it('parses fenced and unfenced replies the same way', () => {
    expect(parseModelOutput('```json\n' + REPLY + '\n```')).toEqual(parseModelOutput(REPLY));
  });

  it('fills defaults for method and headers', () => {
    expect(parseModelOutput(REPLY)).toEqual({
      url: 'http://localhost:3001',
      endpoint: '/students/fetch_daily_use_for_country',
      method: 'POST',
      headers: {},
      params: { country: 'Spain' },
    });
  });

  it('accepts a lowercase method', () => {
    expect(parseModelOutput('{"url": "http://localhost:3001", "method": "get"}').method).toBe('GET');
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseModelOutput('Sure! Here is the request you asked for.')).toThrow(
      MalformedModelOutputError
    );
  });

  it('rejects a reply without a url', () => {
    expect(() => parseModelOutput('{"endpoint": "/students"}')).toThrow(
      'Model output is not a valid dispatch request: url: Required'
    );
  });

  it('rejects non-http urls', () => {
    expect(() => parseModelOutput('{"url": "file:///etc/passwd"}')).toThrow(MalformedModelOutputError);
  });
});
