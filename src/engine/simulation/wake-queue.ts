interface Entry<T> {
  readonly time: number;
  readonly priority: number;
  readonly seq: number;
  readonly value: T;
}

function before<T>(a: Entry<T>, b: Entry<T>): boolean {
  if (a.time !== b.time) return a.time < b.time;
  if (a.priority !== b.priority) return a.priority < b.priority;
  return a.seq < b.seq;
}

/**
 * Binary min-heap ordered by (wake time, priority, insertion sequence).
 * Entries due at the same time come out lowest priority value first;
 * equal priorities keep push order.
 */
export class WakeQueue<T> {
  private readonly heap: Entry<T>[] = [];
  private seq = 0;

  get size(): number {
    return this.heap.length;
  }

  push(time: number, priority: number, value: T): void {
    this.heap.push({ time, priority, seq: this.seq++, value });
    this.siftUp(this.heap.length - 1);
  }

  peekTime(): number | null {
    return this.heap.length > 0 ? this.heap[0].time : null;
  }

  pop(): { time: number; value: T } | null {
    const top = this.heap[0];
    if (top === undefined) return null;

    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return { time: top.time, value: top.value };
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && before(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && before(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}
