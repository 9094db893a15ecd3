import { ERROR_CODES, InvalidArgumentError } from "../types.js";

/**
 * Total order used by {@link BinaryHeapPriorityQueue}: negative when `left`
 * sorts first, positive when `right` does, zero for ties.
 */
export type Comparator<T> = (left: T, right: T) => number;

/** Capacity allocated when the caller does not provide one. */
export const DEFAULT_HEAP_CAPACITY = 16;

export interface BinaryHeapOptions {
  /** Number of slots allocated up front. Must be a positive integer. */
  readonly initialCapacity?: number;
}

export const compareNumbers: Comparator<number> = (left, right) => (left < right ? -1 : left > right ? 1 : 0);

export const compareStrings: Comparator<string> = (left, right) => (left < right ? -1 : left > right ? 1 : 0);

/**
 * Minimum priority queue stored as an implicit binary tree in a dense array:
 * the children of slot `i` live in `2i + 1` and `2i + 2`, and every element
 * compares greater than or equal to its parent. The logical length is tracked
 * apart from the allocated capacity, which doubles whenever an insertion finds
 * the buffer full.
 *
 * Elements that compare equal come out in no particular order.
 */
export class BinaryHeapPriorityQueue<T> {
  private slots: Array<T | undefined>;
  private length = 0;

  constructor(
    private readonly compare: Comparator<T>,
    options: BinaryHeapOptions = {},
  ) {
    const initialCapacity = options.initialCapacity ?? DEFAULT_HEAP_CAPACITY;
    if (!Number.isInteger(initialCapacity) || initialCapacity <= 0) {
      throw new InvalidArgumentError(ERROR_CODES.QUEUE_CAPACITY, "Initial capacity must be a positive integer", {
        details: { initialCapacity },
      });
    }
    this.slots = new Array<T | undefined>(initialCapacity).fill(undefined);
  }

  /** Adds an element in O(log n) amortized time. `null` and `undefined` are rejected. */
  insert(element: T): void {
    if (element === undefined || element === null) {
      throw new InvalidArgumentError(ERROR_CODES.QUEUE_ELEMENT, "Cannot insert an absent element");
    }
    if (this.length === this.slots.length) {
      this.grow();
    }
    this.slots[this.length] = element;
    this.length += 1;
    this.siftUp(this.length - 1);
  }

  /**
   * Removes and returns the minimum element, or `undefined` when the queue is
   * empty. The last element takes the root's place and sinks back down.
   */
  extractMin(): T | undefined {
    if (this.length === 0) {
      return undefined;
    }
    const min = this.read(0);
    const lastIndex = this.length - 1;
    this.slots[0] = this.slots[lastIndex];
    this.slots[lastIndex] = undefined;
    this.length = lastIndex;
    if (this.length > 0) {
      this.siftDown(0);
    }
    return min;
  }

  peekMin(): T | undefined {
    return this.length === 0 ? undefined : this.read(0);
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  size(): number {
    return this.length;
  }

  /** Number of allocated slots, including the unused ones. */
  capacity(): number {
    return this.slots.length;
  }

  /** Drops every element and releases the references held by the buffer. */
  clear(): void {
    this.slots.fill(undefined, 0, this.length);
    this.length = 0;
  }

  /** Copy of the stored elements in heap (level) order. */
  toArray(): T[] {
    const elements: T[] = [];
    for (let index = 0; index < this.length; index += 1) {
      elements.push(this.read(index));
    }
    return elements;
  }

  toString(): string {
    return `[${this.toArray().map(String).join(", ")}]`;
  }

  private grow(): void {
    const next = new Array<T | undefined>(this.slots.length * 2).fill(undefined);
    for (let index = 0; index < this.length; index += 1) {
      next[index] = this.slots[index];
    }
    this.slots = next;
  }

  private siftUp(index: number): void {
    let current = index;
    while (current > 0) {
      const parent = Math.floor((current - 1) / 2);
      if (this.compare(this.read(current), this.read(parent)) >= 0) {
        break;
      }
      this.swap(current, parent);
      current = parent;
    }
  }

  private siftDown(index: number): void {
    let current = index;
    while (true) {
      const left = 2 * current + 1;
      if (left >= this.length) {
        break;
      }
      const right = left + 1;
      const smallest =
        right < this.length && this.compare(this.read(right), this.read(left)) < 0 ? right : left;
      if (this.compare(this.read(smallest), this.read(current)) >= 0) {
        break;
      }
      this.swap(current, smallest);
      current = smallest;
    }
  }

  private swap(first: number, second: number): void {
    [this.slots[first], this.slots[second]] = [this.slots[second], this.slots[first]];
  }

  private read(index: number): T {
    const element = this.slots[index];
    if (element === undefined) {
      throw new Error(`heap slot ${index} is empty`);
    }
    return element;
  }
}
