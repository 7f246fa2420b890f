import { describe, it, expect } from 'vitest';
import {
  RegionQueryError,
  InputNotFoundError,
  MalformedQueryError,
  UnknownOperatorError,
  StoreUnavailableError,
  StoreError,
  QueryAbortedError,
  OutputWriteError,
  DataFormatError,
  ConfigError,
} from '../../src/errors.js';

const cases = [
  { make: () => new InputNotFoundError('q.json'), name: 'InputNotFoundError', stage: 'read' },
  { make: () => new MalformedQueryError('bad', 'query'), name: 'MalformedQueryError', stage: 'build' },
  { make: () => new UnknownOperatorError('query', ['x']), name: 'UnknownOperatorError', stage: 'build' },
  { make: () => new StoreUnavailableError('down'), name: 'StoreUnavailableError', stage: 'evaluate' },
  { make: () => new StoreError('failed'), name: 'StoreError', stage: 'evaluate' },
  { make: () => new QueryAbortedError(), name: 'QueryAbortedError', stage: 'evaluate' },
  { make: () => new OutputWriteError('out.txt', new Error('EACCES')), name: 'OutputWriteError', stage: 'write' },
  { make: () => new DataFormatError('bad line', 'groups.txt', 3), name: 'DataFormatError', stage: 'load' },
  { make: () => new ConfigError(['X: bad']), name: 'ConfigError', stage: 'config' },
] as const;

describe.each(cases)('$name', ({ make, name, stage }) => {
  it('has the correct name', () => {
    expect(make().name).toBe(name);
  });

  it(`is attributed to the ${stage} stage`, () => {
    expect(make().stage).toBe(stage);
  });

  it('is instanceof RegionQueryError and Error', () => {
    const err = make();
    expect(err).toBeInstanceOf(RegionQueryError);
    expect(err).toBeInstanceOf(Error);
  });

  it('has a stack trace', () => {
    expect(make().stack).toBeDefined();
  });
});

describe('MalformedQueryError', () => {
  it('prefixes the message with the node path', () => {
    const err = new MalformedQueryError('operand list must not be empty', 'query.operator_and');
    expect(err.message).toBe('query.operator_and: operand list must not be empty');
    expect(err.path).toBe('query.operator_and');
  });

  it('leaves the message alone for the document root', () => {
    expect(new MalformedQueryError('missing "query" key', '').message).toBe('missing "query" key');
  });

  it('can be attributed to the parse stage and keep its cause', () => {
    const root = new SyntaxError('Unexpected end of JSON input');
    const err = new MalformedQueryError('invalid JSON', '', 'parse', root);
    expect(err.stage).toBe('parse');
    expect(err.cause).toBe(root);
  });
});

describe('UnknownOperatorError', () => {
  it('is a MalformedQueryError', () => {
    expect(new UnknownOperatorError('query', ['operator_xor'])).toBeInstanceOf(MalformedQueryError);
  });

  it('lists the keys it found', () => {
    const err = new UnknownOperatorError('query', ['a', 'b']);
    expect(err.keys).toEqual(['a', 'b']);
    expect(err.message).toBe('query: unknown operator (found keys: a, b)');
  });
});

describe('store errors', () => {
  it('keep the driver error as cause', () => {
    const root = new Error('ECONNREFUSED');
    expect(new StoreUnavailableError('down', root).cause).toBe(root);
    expect(new StoreError('failed', root).cause).toBe(root);
  });

  it('cause is undefined when not provided', () => {
    expect(new StoreError('failed').cause).toBeUndefined();
  });

  it('can be attributed to the load stage', () => {
    expect(new StoreError('failed', undefined, 'load').stage).toBe('load');
  });
});

describe('DataFormatError', () => {
  it('formats file and line', () => {
    expect(new DataFormatError('expected an integer, got "x"', 'groups.txt', 4).message)
      .toBe('groups.txt:4: expected an integer, got "x"');
  });

  it('formats a file without line', () => {
    expect(new DataFormatError('line counts differ', '/data').message).toBe('/data: line counts differ');
  });
});

describe('ConfigError', () => {
  it('joins all issues', () => {
    const err = new ConfigError(['A: bad', 'B: worse']);
    expect(err.message).toBe('Invalid configuration: A: bad; B: worse');
    expect(err.issues).toEqual(['A: bad', 'B: worse']);
  });
});

describe('InputNotFoundError', () => {
  it('names the missing path', () => {
    const err = new InputNotFoundError('/tmp/q.json');
    expect(err.path).toBe('/tmp/q.json');
    expect(err.message).toBe('Input not found: /tmp/q.json');
  });
});
