/**
 * Dispatch and Instantiation Benchmark
 *
 * Measures the cost of call mediation and constructor resolution.
 *
 * Scenarios:
 * 1. Baseline: direct call on the implementation
 * 2. Proxy call without interceptor
 * 3. Proxy call through a forwarding interceptor
 * 4. By-name invocation with argument coercion
 * 5. Instantiation with a warm constructor cache vs. a cold one
 */

import { Bench } from 'tinybench';

import { capability } from '../src/core/capability.js';
import { Component } from '../src/core/component.js';
import { callMethod } from '../src/core/invocation.js';
import { Types } from '../src/core/type-ref.js';
import { Constructs, Implements } from '../src/decorators/index.js';
import { InstantiationContext } from '../src/introspection/instantiation.js';

// ==================== Test Setup ====================

interface Counter {
  add(n: number): number;
}

const CounterC = capability<Counter>('Counter', { add: [Types.Number] });

@Implements(CounterC)
class SimpleCounter implements Counter {
  private total = 0;
  add(n: number): number {
    this.total += n;
    return this.total;
  }
}

@Constructs(Types.String, Types.Number)
class Endpoint {
  constructor(
    public host: string,
    public port: number
  ) {}
}

const plain = new SimpleCounter();
const component = new Component(new SimpleCounter());
const proxied = component.getProxy(CounterC);

const intercepted = new Component(new SimpleCounter());
intercepted.setInvocationInterceptor(CounterC, (target, method, args) =>
  callMethod(target, method, args)
);
const interceptedProxy = intercepted.getProxy(CounterC);

const warm = new InstantiationContext();
warm.instantiate(Endpoint, 'localhost', '8080');

// ==================== Benchmark ====================

const bench = new Bench({
  name: 'Dispatch and Instantiation',
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('baseline: direct call', () => {
  if (plain.add(1) <= 0) throw new Error('Invalid');
});

bench.add('proxy call', () => {
  if (proxied.add(1) <= 0) throw new Error('Invalid');
});

bench.add('proxy call + interceptor', () => {
  if (interceptedProxy.add(1) <= 0) throw new Error('Invalid');
});

bench.add('by-name invoke + coercion', () => {
  if (component.invoke('add', '1') === undefined) throw new Error('Invalid');
});

bench.add('instantiate: warm cache', () => {
  if (warm.instantiate(Endpoint, 'localhost', '8080').port !== 8080) throw new Error('Invalid');
});

bench.add('instantiate: cold cache', () => {
  const cold = new InstantiationContext();
  if (cold.instantiate(Endpoint, 'localhost', '8080').port !== 8080) throw new Error('Invalid');
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Dispatch and Instantiation Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.period
      ? `${(1000 / task.result.period).toLocaleString('en-US', { maximumFractionDigits: 0 })}`
      : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
    hz: task.result?.hz ? task.result.hz.toFixed(2) : 'N/A',
  }))
);

const baseline = bench.tasks.find((t) => t.name === 'baseline: direct call');
const viaProxy = bench.tasks.find((t) => t.name === 'proxy call');

if (baseline?.result?.period && viaProxy?.result?.period) {
  const overhead = ((viaProxy.result.period - baseline.result.period) * 1000000).toFixed(2);
  console.log(`\nProxy dispatch overhead: ${overhead}ns per call`);
}
