// packages/resolver/src/queue.ts

/** Binary min-heap on a numeric priority; equal priorities fall back to `tie`. */
export class MinQueue<T> {
  private heap: Array<{ item: T; priority: number }> = [];

  constructor(private readonly tie: (a: T, b: T) => number) {}

  get size(): number { return this.heap.length; }

  push(item: T, priority: number): void {
    this.heap.push({ item, priority });
    this.up(this.heap.length - 1);
  }

  pop(): { item: T; priority: number } | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.down(0);
    }
    return top;
  }

  private less(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a.priority < b.priority || (a.priority === b.priority && this.tie(a.item, b.item) < 0);
  }

  private swap(i: number, j: number): void {
    const t = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = t;
  }

  private up(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private down(i: number): void {
    const n = this.heap.length;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let m = i;
      if (l < n && this.less(l, m)) m = l;
      if (r < n && this.less(r, m)) m = r;
      if (m === i) break;
      this.swap(i, m);
      i = m;
    }
  }
}
