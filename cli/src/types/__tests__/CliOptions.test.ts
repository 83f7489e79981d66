import { describe, expect, it } from 'vitest';
import { ConfigError } from '@conductor/engine';
import { collect, parseDuration, parseKeyValuePairs, splitList } from '../CliOptions.js';

describe('parseKeyValuePairs', () => {
  it('should split on the first equals sign and trim both sides', () => {
    expect(parseKeyValuePairs(['target = /var', 'query=a=b'])).toEqual({ target: '/var', query: 'a=b' });
  });

  it('should keep the last value of a repeated key', () => {
    expect(parseKeyValuePairs(['mode=fast', 'mode=slow'])).toEqual({ mode: 'slow' });
  });

  it('should reject a pair without an equals sign', () => {
    expect(() => parseKeyValuePairs(['verbose'])).toThrow('Invalid key=value format: verbose');
  });

  it('should reject an empty key as a configuration error', () => {
    expect(() => parseKeyValuePairs(['=x'])).toThrow(ConfigError);
  });
});

describe('parseDuration', () => {
  it('should convert days and hours to milliseconds', () => {
    expect(parseDuration('7', 'days')).toBe(604_800_000);
    expect(parseDuration('1.5', 'hours')).toBe(5_400_000);
  });

  it('should reject negative and non-numeric values', () => {
    expect(() => parseDuration('-1', 'days')).toThrow('Invalid number of days: -1');
    expect(() => parseDuration('soon', 'hours')).toThrow(ConfigError);
    expect(() => parseDuration(' ', 'days')).toThrow(ConfigError);
  });
});

describe('splitList', () => {
  it('should drop blanks around and between commas', () => {
    expect(splitList(' disk, ,net ')).toEqual(['disk', 'net']);
  });

  it('should return undefined for nothing usable', () => {
    expect(splitList(undefined)).toBeUndefined();
    expect(splitList(' , ')).toBeUndefined();
  });
});

describe('collect', () => {
  it('should append without touching the previous array', () => {
    const previous = ['a=1'];
    expect(collect('b=2', previous)).toEqual(['a=1', 'b=2']);
    expect(previous).toEqual(['a=1']);
  });
});
