type Entry<T> = {
  priority: number;
  // Insertion rank; the lower rank wins among equal priorities.
  seq: number;
  item: T;
};

/**
 * Binary min-heap keyed by priority, with an index for decrease-key.
 *
 * Equal priorities pop in insertion order, so the pop sequence depends only
 * on the calls made, never on the heap's internal layout.
 */
export class MinPriorityQueue<T> {
  private readonly heap: Entry<T>[] = [];
  private readonly positions: Map<string, number> = new Map<string, number>();
  private nextSeq: number = 0;

  /**
   * @param keyOf Maps an item to the identity used for lookups.
   */
  public constructor(private readonly keyOf: (item: T) => string) {}

  public get size(): number {
    return this.heap.length;
  }

  public has(item: T): boolean {
    return this.positions.has(this.keyOf(item));
  }

  /**
   * Adds a new item.
   * @param item The item; must not already be queued.
   * @param priority Its priority, lower first.
   */
  public insert(item: T, priority: number): void {
    const key: string = this.keyOf(item);
    if (this.positions.has(key)) {
      throw new Error(`MinPriorityQueue: ${key} is already queued`);
    }
    this.heap.push({ priority, seq: this.nextSeq++, item });
    this.positions.set(key, this.heap.length - 1);
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Removes and returns the item with the lowest priority, earliest insertion first on ties.
   * @returns The item, or undefined when the queue is empty.
   */
  public extractMin(): T | undefined {
    const top: Entry<T> | undefined = this.heap[0];
    if (!top) return undefined;

    const last: Entry<T> | undefined = this.heap.pop();
    this.positions.delete(this.keyOf(top.item));
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.positions.set(this.keyOf(last.item), 0);
      this.siftDown(0);
    }
    return top.item;
  }

  /**
   * Lowers the priority of a queued item. The item keeps its insertion rank.
   * @param item The queued item.
   * @param priority The new priority; must not exceed the current one.
   */
  public decreaseKey(item: T, priority: number): void {
    const key: string = this.keyOf(item);
    const i: number | undefined = this.positions.get(key);
    if (i === undefined) {
      throw new Error(`MinPriorityQueue: ${key} is not queued`);
    }
    if (priority > this.heap[i].priority) {
      throw new Error(`MinPriorityQueue: new priority ${priority} for ${key} exceeds ${this.heap[i].priority}`);
    }
    this.heap[i].priority = priority;
    this.heap[i].item = item;
    this.siftUp(i);
  }

  private less(a: Entry<T>, b: Entry<T>): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
  }

  private swap(i: number, j: number): void {
    const a: Entry<T> = this.heap[i];
    const b: Entry<T> = this.heap[j];
    this.heap[i] = b;
    this.heap[j] = a;
    this.positions.set(this.keyOf(b.item), i);
    this.positions.set(this.keyOf(a.item), j);
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const p: number = (i - 1) >> 1;
      if (!this.less(this.heap[i], this.heap[p])) break;
      this.swap(i, p);
      i = p;
    }
  }

  private siftDown(i: number): void {
    const n: number = this.heap.length;
    while (true) {
      let s: number = i;
      const l: number = i * 2 + 1;
      const r: number = l + 1;
      if (l < n && this.less(this.heap[l], this.heap[s])) s = l;
      if (r < n && this.less(this.heap[r], this.heap[s])) s = r;
      if (s === i) break;
      this.swap(i, s);
      i = s;
    }
  }
}
