import type { SimTime } from '../types/simulation';

export interface ScheduledEvent {
  fireTime: SimTime;
  sequence: number;
  label: string;
  invoke: () => void;
}

function before(a: ScheduledEvent, b: ScheduledEvent): boolean {
  return a.fireTime < b.fireTime || (a.fireTime === b.fireTime && a.sequence < b.sequence);
}

// Binary min-heap ordered by (fireTime, sequence).
export class EventQueue {
  private readonly heap: ScheduledEvent[] = [];

  get size(): number {
    return this.heap.length;
  }

  peek(): ScheduledEvent | undefined {
    return this.heap[0];
  }

  push(event: ScheduledEvent): void {
    this.heap.push(event);
    this.siftUp(this.heap.length - 1);
  }

  pop(): ScheduledEvent | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top && last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      const c = this.heap[child];
      const p = this.heap[parent];
      if (!c || !p || !before(c, p)) {
        return;
      }
      this.heap[child] = p;
      this.heap[parent] = c;
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      const l = this.heap[left];
      const r = this.heap[right];
      const s = this.heap[smallest];
      if (l && s && before(l, s)) {
        smallest = left;
      }
      const current = this.heap[smallest];
      if (r && current && before(r, current)) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      const a = this.heap[parent];
      const b = this.heap[smallest];
      if (!a || !b) {
        return;
      }
      this.heap[parent] = b;
      this.heap[smallest] = a;
      parent = smallest;
    }
  }
}
