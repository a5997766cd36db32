import { describe, expect, it } from 'vitest';

import { capability } from '../src/core/capability.js';
import { Types } from '../src/core/type-ref.js';
import { Accepts, Constructs, Implements } from '../src/decorators/index.js';
import { StaticTypeRegistry } from '../src/registry/static-registry.js';

describe('Decorators', () => {
  it('@Implements records capabilities and rejects anything else', () => {
    const AC = capability('A');
    const BC = capability('B');

    @Implements(AC, BC)
    class Service {}

    expect(StaticTypeRegistry.capabilitiesOf(Service)).toEqual([AC, BC]);
    expect(() => Implements({} as never)).toThrow('@Implements() expects capabilities.');
  });

  it('@Constructs keeps repeated signatures in source order', () => {
    @Constructs(Types.Number)
    @Constructs(Types.String, Types.Number)
    class Endpoint {
      constructor(
        public host: string | number,
        public port?: number
      ) {}
    }

    expect(StaticTypeRegistry.constructorsOf(Endpoint)).toEqual([
      [Types.Number],
      [Types.String, Types.Number],
    ]);
  });

  it('@Accepts records overloads per method', () => {
    class Mailer {
      port: unknown;

      @Accepts(Types.Number)
      @Accepts(Types.String)
      setPort(port: number | string) {
        this.port = port;
      }
    }

    expect(StaticTypeRegistry.methodSignatures(Mailer, 'setPort')).toEqual([
      [Types.Number],
      [Types.String],
    ]);
  });

  it('@Accepts refuses static and symbol-named methods', () => {
    const decorate = Accepts(Types.String);

    expect(() => decorate(class Factory {}, 'make', {})).toThrow(
      "@Accepts() applies to instance methods, not static 'make'"
    );
    expect(() => decorate({}, Symbol('hidden'), {})).toThrow(
      '@Accepts() expects a string-named method'
    );
    expect(() => decorate(Object.create(null), 'orphan', {})).toThrow(
      "@Accepts() could not find the class declaring 'orphan'"
    );
  });
});
