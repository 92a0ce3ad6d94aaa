import { describe, it, expect } from 'vitest';
import { toJsonValue } from '../value/convert.js';
import { NULL_NODE, booleanNode, numberNode, stringNode } from '../value/types.js';
import { literalNode, readEnvTree, treeFromPairs } from './env.js';

describe('literalNode', () => {
  it('should type booleans, null and numbers', () => {
    expect(literalNode('TRUE')).toEqual(booleanNode(true));
    expect(literalNode('false')).toEqual(booleanNode(false));
    expect(literalNode('null')).toBe(NULL_NODE);
    expect(literalNode(' 42 ')).toEqual(numberNode(42));
    expect(literalNode('-0.5')).toEqual(numberNode(-0.5));
    expect(literalNode('1e3')).toEqual(numberNode(1000));
  });

  it('should keep numbers with leading zeros as strings', () => {
    expect(literalNode('007')).toEqual(stringNode('007'));
  });

  it('should read JSON arrays and objects', () => {
    expect(toJsonValue(literalNode('["a", 2]'))).toEqual(['a', 2]);
    expect(toJsonValue(literalNode('{"k": true}'))).toEqual({ k: true });
  });

  it('should keep malformed JSON and plain text verbatim', () => {
    expect(literalNode('{oops')).toEqual(stringNode('{oops'));
    expect(literalNode('hello ')).toEqual(stringNode('hello '));
    expect(literalNode('30d')).toEqual(stringNode('30d'));
  });
});

describe('readEnvTree', () => {
  it('should nest on double underscores and lowercase the names', () => {
    const tree = readEnvTree('APP_', {
      APP_DB__HOST: 'localhost',
      APP_DB__PORT: '5432',
      APP_DEBUG: 'TRUE',
      APP_NAME: '007',
      APP_NOTE: 'null',
      APP_TAGS: '["a","b"]',
      OTHER_NAME: 'ignored',
    });

    expect(toJsonValue(tree)).toEqual({
      db: { host: 'localhost', port: 5432 },
      debug: true,
      name: '007',
      note: null,
      tags: ['a', 'b'],
    });
  });

  it('should skip names with an empty segment', () => {
    expect(toJsonValue(readEnvTree('APP_', { APP_BAD__: 'x', APP___LEAD: 'y', APP_: 'z' }))).toEqual({});
  });

  it('should let nested variables win over a scalar with the same name', () => {
    expect(toJsonValue(readEnvTree('APP_', { APP_DB__HOST: 'h', APP_DB: 'x' }))).toEqual({ db: { host: 'h' } });
  });

  it('should return an empty mapping when nothing matches', () => {
    expect(readEnvTree('APP_', { HOME: '/home/test' }).entries.size).toBe(0);
  });
});

describe('treeFromPairs', () => {
  it('should nest on the given separator and keep the names as written', () => {
    const tree = treeFromPairs(
      [
        ['server.Host', 'localhost'],
        ['server.port', '8080'],
        ['server..bad', 'x'],
      ],
      '.'
    );

    expect(toJsonValue(tree)).toEqual({ server: { Host: 'localhost', port: 8080 } });
  });

  it('should let a later scalar replace an earlier mapping', () => {
    expect(toJsonValue(treeFromPairs([['db.host', 'h'], ['db', 'x']], '.'))).toEqual({ db: 'x' });
  });
});
