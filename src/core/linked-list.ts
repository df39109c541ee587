/**
 * Doubly linked list keyed by a unique string, with a navigation cursor.
 * O(1) append, O(1) removal by key, O(1) cursor moves.
 */

interface ListNode<T> {
  key: string;
  value: T;
  prev: ListNode<T> | null;
  next: ListNode<T> | null;
}

export class KeyedLinkedList<T> {
  private head: ListNode<T> | null = null;
  private tail: ListNode<T> | null = null;
  private cursor: ListNode<T> | null = null;
  private index = new Map<string, ListNode<T>>();

  get size(): number {
    return this.index.size;
  }

  isEmpty(): boolean {
    return this.index.size === 0;
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  /**
   * Append at the tail. The first element appended to an empty list takes the cursor.
   */
  append(key: string, value: T): void {
    if (this.index.has(key)) {
      throw new Error(`Duplicate list key: ${key}`);
    }

    const node: ListNode<T> = { key, value, prev: this.tail, next: null };
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.index.set(key, node);

    if (!this.cursor) {
      this.cursor = node;
    }
  }

  /**
   * Unlink a node. A removed cursor moves to the next node, or the previous one at the tail.
   */
  remove(key: string): T | undefined {
    const node = this.index.get(key);
    if (!node) return undefined;

    if (this.cursor === node) {
      this.cursor = node.next ?? node.prev;
    }

    if (node.prev) node.prev.next = node.next;
    else this.head = node.next;

    if (node.next) node.next.prev = node.prev;
    else this.tail = node.prev;

    this.index.delete(key);
    return node.value;
  }

  clear(): void {
    this.head = null;
    this.tail = null;
    this.cursor = null;
    this.index.clear();
  }

  // ==========================================================================
  // Cursor
  // ==========================================================================

  currentKey(): string | null {
    return this.cursor?.key ?? null;
  }

  /**
   * Move cursor forward. Stays put at the tail and returns null.
   */
  next(): T | null {
    if (!this.cursor?.next) return null;
    this.cursor = this.cursor.next;
    return this.cursor.value;
  }

  /**
   * Move cursor backward. Stays put at the head and returns null.
   */
  previous(): T | null {
    if (!this.cursor?.prev) return null;
    this.cursor = this.cursor.prev;
    return this.cursor.value;
  }

  focus(key: string): boolean {
    const node = this.index.get(key);
    if (!node) return false;
    this.cursor = node;
    return true;
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  keys(): string[] {
    const result: string[] = [];
    for (let node = this.head; node; node = node.next) {
      result.push(node.key);
    }
    return result;
  }

  values(): T[] {
    const result: T[] = [];
    for (let node = this.head; node; node = node.next) {
      result.push(node.value);
    }
    return result;
  }
}
