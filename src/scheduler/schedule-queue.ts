import type { Job } from '../types';

/**
 * A job together with the time it is next due.
 */
export interface ScheduleEntry {
  readonly job: Job;
  /** Epoch milliseconds */
  nextDue: number;
  /** Insertion order, breaks ties between entries due at the same time */
  readonly sequence: number;
}

/**
 * Binary min-heap of schedule entries keyed by next-due time.
 */
export class ScheduleQueue {
  private readonly heap: ScheduleEntry[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(entry: ScheduleEntry): void {
    this.heap.push(entry);
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Earliest entry without removing it.
   */
  peek(): ScheduleEntry | undefined {
    return this.heap[0];
  }

  /**
   * Remove and return the earliest entry.
   */
  pop(): ScheduleEntry | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /**
   * Remove and return every entry due at or before `now`, earliest first.
   */
  popDue(now: number): ScheduleEntry[] {
    const due: ScheduleEntry[] = [];
    let head = this.peek();
    while (head !== undefined && head.nextDue <= now) {
      this.pop();
      due.push(head);
      head = this.peek();
    }
    return due;
  }

  entries(): ScheduleEntry[] {
    return [...this.heap].sort(compare);
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (compare(this.heap[child], this.heap[parent]) >= 0) {
        return;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    const length = this.heap.length;
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < length && compare(this.heap[left], this.heap[smallest]) < 0) {
        smallest = left;
      }
      if (right < length && compare(this.heap[right], this.heap[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}

function compare(a: ScheduleEntry, b: ScheduleEntry): number {
  return a.nextDue - b.nextDue || a.sequence - b.sequence;
}
