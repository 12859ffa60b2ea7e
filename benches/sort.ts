import { Bench, blackbox } from "../src/index.js";

const length = blackbox(99);
const array = Array.from({ length }, () => Math.random());

function selectionSort(arr: number[]): number[] {
    for (let i = 0; i < arr.length - 1; ++i) {
        let min = i;
        for (let j = i + 1; j < arr.length; ++j) {
            if (arr[j] < arr[min]) {
                min = j;
            }
        }
        const tmp = arr[i];
        arr[i] = arr[min];
        arr[min] = tmp;
    }
    return arr;
}

function insertionSort(arr: number[]): number[] {
    for (let i = 1; i < arr.length; ++i) {
        const x = arr[i];
        let j = i - 1;
        while (j >= 0 && arr[j] > x) {
            arr[j + 1] = arr[j];
            --j;
        }
        arr[j + 1] = x;
    }
    return arr;
}

// every call sorts its own copy of the same shuffled input
export default [
    Bench.new("selectionSort(99)").runSeeded(array, selectionSort),
    Bench.new("insertionSort(99)").runSeeded(array, insertionSort),
    Bench.spacer(),
    Bench.new("Array.prototype.sort(99)").runSeededWith(
        () => array.slice(),
        arr => arr.sort((a, b) => a - b)
    )
];
