import { SortedMap, KeyNotFoundError, type Comparable } from '../src/index';

// === Utilities ===

function measure<T>(label: string, fn: () => T): T {
    const start = performance.now();
    const result = fn();
    const end = performance.now();
    console.log(`[PERF] ${label}: ${(end - start).toFixed(2)}ms`);
    return result;
}

console.log('=== SortedMap Tour ===\n');

// ============================================================================
// 1. Basic Operations
// ============================================================================
console.log('--- 1: Insert, Lookup, Delete ---');
const scores = new SortedMap<string, number>([['carol', 71], ['alice', 93], ['bob', 85]]);
console.log(String(scores));
scores.set('dave', 64).set('alice', 95);
scores.delete('bob');
console.log('alice =', scores.get('alice'), '| size =', scores.size);

try {
    scores.get('mallory');
} catch (err) {
    if (!(err instanceof KeyNotFoundError)) throw err;
    console.log('Lookup failed as expected:', err.message);
}
console.log('has(mallory):', scores.has('mallory'));
console.log();

// ============================================================================
// 2. Composite & Custom Keys
// ============================================================================
console.log('--- 2: Array Keys and Comparable Objects ---');
const grid = new SortedMap<[number, number], string>();
grid.set([1, 2], 'b').set([0, 5], 'a').set([1, 0], 'c');
console.log([...grid.keys()].map((k) => `(${k.join(',')})`).join(' '));

class Version implements Comparable {
    constructor(readonly major: number, readonly minor: number) {}
    compareTo(other: Version): number {
        return this.major - other.major || this.minor - other.minor;
    }
    toString() { return `v${this.major}.${this.minor}`; }
}

const releases = new SortedMap<Version, string>()
    .set(new Version(2, 0), 'rewrite')
    .set(new Version(1, 4), 'patch')
    .set(new Version(1, 10), 'feature');
console.log(String(releases));
console.log();

// ============================================================================
// 3. Balance Under Sorted Input
// ============================================================================
console.log('--- 3: Ascending Inserts Stay Logarithmic ---');
const N = 100_000;
const big = measure(`Insert ${N} ascending keys`, () => {
    const m = new SortedMap<number, number>();
    for (let i = 0; i < N; i++) m.set(i, i * i);
    return m;
});
console.log('size =', big.size, '| height =', big.height);
measure('Verify invariants', () => big.checkValid());
measure(`Delete every second key`, () => {
    for (let i = 0; i < N; i += 2) big.delete(i);
});
console.log('size =', big.size, '| height =', big.height, '| first =', big.first());
