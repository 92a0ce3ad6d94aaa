import { describe, it, expect, vi } from 'vitest';
import {
  AmbiguousSubclassException,
  ConfigDecodeError,
  MalformedConfigException,
  MissingTypeException,
  ParseException,
  TypeConfigException,
  UnexpectedKeysException,
} from '../diagnostics/errors.js';
import { buildDescriptor } from '../schema/builder.js';
import { SubclassRegistry, defineBase } from '../schema/registry.js';
import { t } from '../schema/index.js';
import type { RecordShape } from '../schema/types.js';
import { toValueTree } from '../value/convert.js';
import { decode, decodeDescriptor, decodeOrThrow } from './decode.js';
import type { DecodeResult } from './result.js';

function errorOf<T>(result: DecodeResult<T>): ConfigDecodeError {
  if (result.success) {
    throw new Error('Expected decoding to fail');
  }
  return result.error;
}

function valueOf<T>(result: DecodeResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected decoding to succeed: ${result.error.message}`);
  }
  return result.value;
}

const Conn = t.record('Conn', { host: t.string(), port: t.integer() });

describe('decode', () => {
  describe('records and primitives', () => {
    it('should decode a flat record', () => {
      const result = decode(toValueTree({ host: 'db', port: 5432 }), Conn);

      expect(valueOf(result)).toEqual({ host: 'db', port: 5432 });
    });

    it('should widen integers to float but not the reverse', () => {
      const Ratio = t.record('Ratio', { value: t.float() });
      const Count = t.record('Count', { value: t.integer() });

      expect(valueOf(decode(toValueTree({ value: 2 }), Ratio))).toEqual({ value: 2 });

      const error = errorOf(decode(toValueTree({ value: 2.5 }), Count));
      expect(error).toBeInstanceOf(MalformedConfigException);
      expect(error.message).toBe('expected integer at .value, got float');
      expect(error.path).toBe('.value');
    });

    it('should accept boolean literals in any case', () => {
      const Flags = t.record('Flags', { enabled: t.boolean(), verbose: t.boolean() });

      const result = decode(toValueTree({ enabled: 'TRUE', verbose: false }), Flags);

      expect(valueOf(result)).toEqual({ enabled: true, verbose: false });
    });

    it('should reject other boolean strings with ParseException', () => {
      const Flags = t.record('Flags', { enabled: t.boolean() });

      const error = errorOf(decode(toValueTree({ enabled: 'maybe' }), Flags));

      expect(error).toBeInstanceOf(ParseException);
      expect(error.message).toBe('cannot parse "maybe" as boolean at .enabled');
    });

    it('should reject numbers where a string is expected', () => {
      const error = errorOf(decode(toValueTree({ host: 1, port: 5432 }), Conn));

      expect(error.message).toBe('expected string at .host, got integer');
    });

    it('should report the full path of a nested failure', () => {
      const Inner = t.record('Inner', { x: t.integer() });
      const Outer = t.record('Outer', { inner: Inner });

      expect(valueOf(decode(toValueTree({ inner: { x: 1 } }), Outer))).toEqual({ inner: { x: 1 } });

      const error = errorOf(decode(toValueTree({ inner: { x: 'no' } }), Outer));
      expect(error.message).toBe('expected integer at .inner.x, got string');
      expect(error.path).toBe('.inner.x');
    });

    it('should reject a scalar where a record is expected', () => {
      const error = errorOf(decode(toValueTree('db:5432'), Conn));

      expect(error.message).toBe('expected Conn at <root>, got string');
    });
  });

  describe('collections', () => {
    it('should decode lists and report item paths', () => {
      const Tags = t.record('Tags', { values: t.list(t.string()) });

      expect(valueOf(decode(toValueTree({ values: ['a', 'b'] }), Tags))).toEqual({
        values: ['a', 'b'],
      });

      const error = errorOf(decode(toValueTree({ values: ['a', 2] }), Tags));
      expect(error.message).toBe('expected string at .values[1], got integer');
    });

    it('should decode dicts keeping key order', () => {
      const Ports = t.record('Ports', { values: t.dict(t.integer()) });

      const value = valueOf(decode(toValueTree({ values: { b: 2, a: 1 } }), Ports));

      expect(value).toEqual({ values: { b: 2, a: 1 } });
      expect(Object.keys(value.values)).toEqual(['b', 'a']);
    });

    it('should decode a dict at the root', () => {
      const result = decode(toValueTree({ a: 1, b: 2 }), t.dict(t.integer()));

      expect(valueOf(result)).toEqual({ a: 1, b: 2 });
    });

    it('should reject a mapping where a list is expected', () => {
      const error = errorOf(decode(toValueTree({ a: 1 }), t.list(t.integer())));

      expect(error.message).toBe('expected sequence at <root>, got mapping');
    });

    it('should keep __proto__ as an ordinary dict key', () => {
      const root = toValueTree(JSON.parse('{"__proto__": 1, "a": 2}'));

      const value = valueOf(decode(root, t.dict(t.integer())));

      expect(Object.keys(value)).toEqual(['__proto__', 'a']);
      expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    });
  });

  describe('optional fields and defaults', () => {
    const Profile = t.record('Profile', { name: t.optional(t.string()) });

    it('should leave out an absent optional field', () => {
      const value = valueOf(decode(toValueTree({}), Profile));

      expect(value).toEqual({});
      expect('name' in value).toBe(false);
    });

    it('should treat an explicit null as absent', () => {
      const value = valueOf(decode(toValueTree({ name: null }), Profile));

      expect('name' in value).toBe(false);
    });

    it('should decode a present optional field', () => {
      expect(valueOf(decode(toValueTree({ name: 'ada' }), Profile))).toEqual({ name: 'ada' });
    });

    it('should fill literal defaults and factory defaults', () => {
      const Server = t.record('Server', {
        name: t.string(),
        port: t.withDefault(t.integer(), 8080),
        tags: t.withFactory(t.list(t.string()), () => []),
      });

      const value = valueOf(decode(toValueTree({ name: 'api' }), Server));

      expect(value).toEqual({ name: 'api', port: 8080, tags: [] });
    });

    it('should prefer present keys over defaults', () => {
      const Server = t.record('Server', { port: t.withDefault(t.integer(), 8080) });

      expect(valueOf(decode(toValueTree({ port: 9000 }), Server))).toEqual({ port: 9000 });
    });

    it('should call the factory on every decode that needs it', () => {
      const produce = vi.fn((): string[] => []);
      const Server = t.record('Server', { tags: t.withFactory(t.list(t.string()), produce) });

      const first = valueOf(decode(toValueTree({}), Server));
      const second = valueOf(decode(toValueTree({}), Server));
      valueOf(decode(toValueTree({ tags: ['x'] }), Server));

      expect(produce).toHaveBeenCalledTimes(2);
      expect(first.tags).not.toBe(second.tags);
    });

    it('should give every decode its own copy of a literal default', () => {
      const Server = t.record('Server', {
        tags: t.withDefault(t.list(t.string()), []),
        limits: t.withDefault(t.dict(t.integer()), { cpu: 2 }),
      });

      const first = valueOf(decode(toValueTree({}), Server));
      first.tags.push('leak');
      first.limits.cpu = 99;
      const second = valueOf(decode(toValueTree({}), Server));

      expect(second).toEqual({ tags: [], limits: { cpu: 2 } });
    });

    it('should report the first missing required field at the field path', () => {
      const error = errorOf(decode(toValueTree({}), Conn));

      expect(error).toBeInstanceOf(MalformedConfigException);
      expect(error.message).toBe('expected type Conn at <root>, no host found in record');
      expect(error.path).toBe('.host');
    });
  });

  describe('unexpected keys', () => {
    const Greeting = t.record('Greeting', { a: t.string() });

    it('should reject leftover keys in strict mode, sorted', () => {
      const error = errorOf(decode(toValueTree({ a: 'hello', c: 1, b: 'world' }), Greeting));

      expect(error).toBeInstanceOf(UnexpectedKeysException);
      expect(error.message).toBe(
        'unexpected key(s) "b", "c" detected for type Greeting at <root>'
      );
      expect(error instanceof UnexpectedKeysException && error.keys).toEqual(['b', 'c']);
    });

    it('should drop leftover keys in lenient mode', () => {
      const result = decode(toValueTree({ a: 'hello', b: 'world' }), Greeting, {
        strictUnexpectedKeys: false,
      });

      expect(valueOf(result)).toEqual({ a: 'hello' });
    });

    it('should report leftover keys inside a dict of records', () => {
      const Item = t.record('Item', { name: t.string() });
      const Catalog = t.record('Catalog', { items: t.dict(Item) });

      const error = errorOf(
        decode(toValueTree({ items: { first: { name: 'a', extra: 1 } } }), Catalog)
      );

      expect(error.message).toBe('unexpected key(s) "extra" detected for type Item at .items.first');
      expect(error.path).toBe('.items.first');
    });

    it('should treat _type as an ordinary leftover key on a plain record', () => {
      const error = errorOf(decode(toValueTree({ a: 'x', _type: 'Greeting' }), Greeting));

      expect(error.message).toBe('unexpected key(s) "_type" detected for type Greeting at <root>');
    });
  });

  describe('enumerations', () => {
    enum Color {
      RED = 1,
      GREEN = 2,
    }
    const Paint = t.record('Paint', { color: t.enumeration('Color', Color) });

    it('should match by name', () => {
      expect(valueOf(decode(toValueTree({ color: 'RED' }), Paint))).toEqual({ color: Color.RED });
    });

    it('should fall back to the raw value, also given as a string', () => {
      expect(valueOf(decode(toValueTree({ color: '2' }), Paint))).toEqual({ color: Color.GREEN });
      expect(valueOf(decode(toValueTree({ color: 1 }), Paint))).toEqual({ color: Color.RED });
    });

    it('should prefer a name match over a raw value match', () => {
      const Swapped = t.enumeration('Swapped', { low: 'high', high: 'low' });

      expect(valueOf(decode(toValueTree('high'), Swapped))).toBe('low');
    });

    it('should list the valid names when nothing matches', () => {
      const error = errorOf(decode(toValueTree({ color: 'BLUE' }), Paint));

      expect(error).toBeInstanceOf(ParseException);
      expect(error.message).toBe('cannot parse "BLUE" as Color at .color, expected one of RED, GREEN');
    });

    it('should reject null and collections as a shape mismatch', () => {
      const error = errorOf(decode(toValueTree({ color: null }), Paint));

      expect(error).toBeInstanceOf(MalformedConfigException);
      expect(error.message).toBe('expected Color at .color, got null');
    });

    it('should decode name-only enumerations to the name', () => {
      const Speed = t.enumeration('Speed', ['fast', 'slow'] as const);

      expect(valueOf(decode(toValueTree('slow'), Speed))).toBe('slow');
    });
  });

  describe('timestamps and durations', () => {
    const Event = t.record('Event', { at: t.timestamp() });
    const Retention = t.record('Retention', { span: t.duration() });

    it('should normalize a timestamp with offset to the absolute instant', () => {
      const value = valueOf(decode(toValueTree({ at: '1997-07-16T19:20:07+01:00' }), Event));

      expect(value.at).toBeInstanceOf(Date);
      expect(value.at.toISOString()).toBe('1997-07-16T18:20:07.000Z');
    });

    it('should reject a malformed timestamp with ParseException', () => {
      const error = errorOf(decode(toValueTree({ at: '1997-07-16 19:20:0701:00' }), Event));

      expect(error).toBeInstanceOf(ParseException);
      expect(error.message).toBe(
        'cannot parse "1997-07-16 19:20:0701:00" as ISO-8601 timestamp with offset at .at'
      );
    });

    it('should decode a compact duration', () => {
      const value = valueOf(decode(toValueTree({ span: '2d' }), Retention));

      expect(value.span).toEqual({ years: 0, months: 0, days: 2, hours: 0, minutes: 0, seconds: 0 });
    });

    it('should reject an unknown duration unit', () => {
      const error = errorOf(decode(toValueTree({ span: '2 fortnights' }), Retention));

      expect(error).toBeInstanceOf(ParseException);
      expect(error.message).toBe('cannot parse "2 fortnights" as duration at .span');
    });
  });

  describe('unions', () => {
    class Block {
      constructor(readonly a: string) {}
    }
    const B = t.record('B', { a: t.string() }, { construct: (values) => new Block(values.a) });

    it('should return the first variant that succeeds', () => {
      const blockFirst = valueOf(decode(toValueTree({ a: 'test' }), t.union(B, t.dict(t.string()))));
      const dictFirst = valueOf(decode(toValueTree({ a: 'test' }), t.union(t.dict(t.string()), B)));

      expect(blockFirst).toBeInstanceOf(Block);
      expect(dictFirst).not.toBeInstanceOf(Block);
      expect(dictFirst).toEqual({ a: 'test' });
    });

    it('should match a record or a primitive', () => {
      const Holder = t.record('Holder', { value: t.union(B, t.string()) });

      expect(valueOf(decode(toValueTree({ value: 'plain' }), Holder))).toEqual({ value: 'plain' });
    });

    it('should aggregate every variant failure in declaration order', () => {
      const Holder = t.record('Holder', { value: t.union(B, t.string()) });

      const error = errorOf(decode(toValueTree({ value: 5 }), Holder));

      expect(error).toBeInstanceOf(TypeConfigException);
      expect(error.message).toBe(
        'expected one of B | string at .value, failed variants:\n' +
          '- expected B at .value, got integer\n' +
          '- expected string at .value, got integer'
      );
      expect(error.causes).toHaveLength(2);
    });
  });

  describe('open polymorphism', () => {
    interface InputSource {
      describe(): string;
    }
    class IntImpl implements InputSource {
      constructor(
        readonly area_code: number,
        readonly phone_num: string
      ) {}
      describe(): string {
        return `The area code for ${this.phone_num} is ${String(this.area_code)}`;
      }
    }
    class StringImpl implements InputSource {
      constructor(
        readonly name: string,
        readonly age: string
      ) {}
      describe(): string {
        return `${this.name} is ${this.age} years old.`;
      }
    }

    const InputType = defineBase<InputSource>('InputType');
    const registry = new SubclassRegistry();
    registry.register(
      InputType,
      t.record(
        'IntImpl',
        { area_code: t.integer(), phone_num: t.string() },
        { construct: (values) => new IntImpl(values.area_code, values.phone_num) }
      )
    );
    registry.register(
      InputType,
      t.record(
        'StringImpl',
        { name: t.string(), age: t.string() },
        { construct: (values) => new StringImpl(values.name, values.age) }
      )
    );
    const Base = t.record('Base', { location: t.string(), input_source: t.open(InputType) });

    it('should pick the single matching candidate', () => {
      const value = valueOf(
        decode(
          toValueTree({ location: 'Europe', input_source: { name: 'Thailand', age: '12' } }),
          Base,
          { registry }
        )
      );

      expect(value.input_source).toBeInstanceOf(StringImpl);
      expect(value.input_source.describe()).toBe('Thailand is 12 years old.');
    });

    it('should pick the other candidate for its fields', () => {
      const value = valueOf(
        decode(
          toValueTree({ location: 'Europe', input_source: { area_code: 94, phone_num: '1234567' } }),
          Base,
          { registry }
        )
      );

      expect(value.input_source.describe()).toBe('The area code for 1234567 is 94');
    });

    it('should list every candidate failure when nothing matches', () => {
      const error = errorOf(
        decode(
          toValueTree({
            location: 'Europe',
            input_source: { name: 'Thailand', age: '12', city: 'Paris' },
          }),
          Base,
          { registry }
        )
      );

      expect(error).toBeInstanceOf(TypeConfigException);
      expect(error.message).toBe(
        'expected type InputType at .input_source, failed subtypes:\n' +
          '- expected type IntImpl at .input_source, no area_code found in record\n' +
          '- unexpected key(s) "city" detected for type StringImpl at .input_source'
      );
      expect(error.path).toBe('.input_source');
    });

    describe('ambiguity', () => {
      const AmbigBase = defineBase<{ kind: string; bar: string }>('AmbigBase');
      const ambiguous = new SubclassRegistry();
      ambiguous.register(
        AmbigBase,
        t.record('AmbigImplOne', { bar: t.string() }, { construct: (values) => ({ kind: 'one', ...values }) })
      );
      ambiguous.register(
        AmbigBase,
        t.record('AmbigImplTwo', { bar: t.string() }, { construct: (values) => ({ kind: 'two', ...values }) })
      );
      const Holder = t.record('Holder', { a: t.string(), foo: t.open(AmbigBase) });

      it('should reject several matching candidates', () => {
        const error = errorOf(
          decode(toValueTree({ a: 'Europe', foo: { bar: 'Baz' } }), Holder, { registry: ambiguous })
        );

        expect(error).toBeInstanceOf(AmbiguousSubclassException);
        expect(error.message).toBe(
          "multiple subtypes of AmbigBase matched at .foo, use '_type' to disambiguate:\n" +
            '- AmbigImplOne\n' +
            '- AmbigImplTwo'
        );
      });

      it('should decode the candidate named by _type', () => {
        const value = valueOf(
          decode(
            toValueTree({ a: 'Europe', foo: { _type: 'AmbigImplTwo', bar: 'Baz' } }),
            Holder,
            { registry: ambiguous }
          )
        );

        expect(value.foo).toEqual({ kind: 'two', bar: 'Baz' });
      });

      it('should reject a _type naming no registered candidate', () => {
        const error = errorOf(
          decode(toValueTree({ a: 'Europe', foo: { _type: 'Nope', bar: 'Baz' } }), Holder, {
            registry: ambiguous,
          })
        );

        expect(error).toBeInstanceOf(TypeConfigException);
        expect(error.message).toBe(
          'unknown subtype "Nope" of AmbigBase at .foo, registered subtypes: AmbigImplOne, AmbigImplTwo'
        );
      });

      it('should wrap the failure of the candidate named by _type', () => {
        const error = errorOf(
          decode(toValueTree({ a: 'Europe', foo: { _type: 'AmbigImplOne' } }), Holder, {
            registry: ambiguous,
          })
        );

        expect(error).toBeInstanceOf(TypeConfigException);
        expect(error.message).toBe(
          'expected type AmbigBase at .foo, failed subtypes:\n' +
            '- expected type AmbigImplOne at .foo, no bar found in record'
        );
      });

      it('should reject a non-string _type', () => {
        const error = errorOf(
          decode(toValueTree({ a: 'Europe', foo: { _type: 3, bar: 'Baz' } }), Holder, {
            registry: ambiguous,
          })
        );

        expect(error.message).toBe('expected string at .foo._type, got integer');
      });
    });

    it('should fail when the base has no registered subtypes', () => {
      const Lonely = defineBase<unknown>('Lonely');
      const Holder = t.record('Holder', { foo: t.open(Lonely) });

      const error = errorOf(decode(toValueTree({ foo: {} }), Holder, { registry: new SubclassRegistry() }));

      expect(error.message).toBe('no registered subtypes of Lonely at .foo');
    });

    it('should use records declared with extends through the default registry', () => {
      const Plugin = defineBase<{ command: string }>('Plugin');
      t.record('EchoPlugin', { command: t.string() }, { extends: Plugin });

      const value = valueOf(decode(toValueTree({ command: 'echo' }), t.open(Plugin)));

      expect(value).toEqual({ command: 'echo' });
    });
  });

  describe('dynamic values', () => {
    it('should preserve shape and scalar kinds', () => {
      const Meta = t.record('Meta', { meta: t.dynamic() });

      const value = valueOf(
        decode(toValueTree({ meta: { a: 1, b: [true, 'x', 1.5], c: { d: '2' } } }), Meta)
      );

      expect(value.meta).toEqual({ a: 1, b: [true, 'x', 1.5], c: { d: '2' } });
    });

    it('should turn null into absence', () => {
      const value = valueOf(decode(toValueTree({ keep: 1, drop: null }), t.dynamic()));

      expect(value).toEqual({ keep: 1 });
      expect(Object.keys(value ?? {})).toEqual(['keep']);
    });

    it('should accept dynamic values inside lists', () => {
      const value = valueOf(decode(toValueTree([1, 'two', { three: 3 }]), t.list(t.dynamic())));

      expect(value).toEqual([1, 'two', { three: 3 }]);
    });
  });

  describe('recursion and depth', () => {
    interface TreeNode {
      name: string;
      children: TreeNode[];
    }
    const TreeNode: RecordShape<TreeNode> = t.record('TreeNode', {
      name: t.string(),
      children: t.withFactory(t.list(t.lazy<TreeNode>(() => TreeNode)), () => []),
    });

    it('should decode recursive records through lazy references', () => {
      const value = valueOf(decode(toValueTree({ name: 'root', children: [{ name: 'leaf' }] }), TreeNode));

      expect(value).toEqual({ name: 'root', children: [{ name: 'leaf', children: [] }] });
    });

    it('should stop at the maximum nesting depth', () => {
      const error = errorOf(
        decode(toValueTree([[[1]]]), t.list(t.list(t.list(t.integer()))), { maxDepth: 2 })
      );

      expect(error).toBeInstanceOf(MalformedConfigException);
      expect(error.message).toBe('maximum nesting depth of 2 exceeded at [0][0][0]');
    });

    it('should reject a maxDepth that is not a positive integer', () => {
      expect(() => decode(toValueTree(1), t.integer(), { maxDepth: 0 })).toThrow(RangeError);
    });
  });

  describe('schema errors', () => {
    it('should return MissingTypeException for a bare list field', () => {
      const Bad = t.record('Bad', { values: t.list() });

      const error = errorOf(decode(toValueTree({ values: [] }), Bad));

      expect(error).toBeInstanceOf(MissingTypeException);
      expect(error.message).toBe('missing item type for list at .values');
    });

    it('should return MissingTypeException for a bare dict inside an optional', () => {
      const error = errorOf(decode(toValueTree({}), t.optional(t.dict())));

      expect(error.message).toBe('missing value type for dict at <root>');
    });
  });

  describe('record constructors', () => {
    it('should turn a constructor error into a diagnostic', () => {
      const Port = t.record(
        'Port',
        { value: t.integer() },
        {
          construct: (values) => {
            if (values.value > 65535) {
              throw new Error('port out of range');
            }
            return values.value;
          },
        }
      );

      const error = errorOf(decode(toValueTree({ value: 70000 }), Port));

      expect(error).toBeInstanceOf(MalformedConfigException);
      expect(error.message).toBe('cannot construct Port at <root>: port out of range');
    });
  });

  describe('determinism', () => {
    it('should produce identical diagnostics on repeated decodes', () => {
      const root = toValueTree({ host: 5, port: 'x' });

      const first = errorOf(decode(root, Conn));
      const second = errorOf(decode(root, Conn));

      expect(second.message).toBe(first.message);
      expect(second.toJSON()).toEqual(first.toJSON());
    });
  });

  describe('decodeDescriptor', () => {
    it('should decode against a prebuilt descriptor', () => {
      const descriptor = buildDescriptor(Conn);

      const result = decodeDescriptor(toValueTree({ host: 'db', port: 1 }), descriptor);

      expect(valueOf(result)).toEqual({ host: 'db', port: 1 });
    });
  });

  describe('decodeOrThrow', () => {
    it('should return the value', () => {
      expect(decodeOrThrow(toValueTree({ host: 'db', port: 1 }), Conn)).toEqual({ host: 'db', port: 1 });
    });

    it('should throw the diagnostic', () => {
      expect(() => decodeOrThrow(toValueTree({ host: 'db' }), Conn)).toThrow(
        'expected type Conn at <root>, no port found in record'
      );
    });
  });
});
