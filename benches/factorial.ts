import { Bench, blackbox } from "../src/index.js";

function rFactorial(n: bigint): bigint {
    return n === 0n ? 1n : n * rFactorial(n - 1n);
}

function lFactorial(n: bigint): bigint {
    let r = 1n;
    while (n > 1n) {
        r *= n--;
    }
    return r;
}

const input = blackbox(100n);

export default [
    Bench.new("rFactorial(100n)").run(() => rFactorial(input)),
    Bench.new("lFactorial(100n)").run(() => lFactorial(input))
];
