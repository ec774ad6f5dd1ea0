/**
 * Stack of deep, independent snapshots. The controller pushes one before each
 * point, pops it again if the point is aborted, and pops it to undo.
 */
export class UndoHistory<T> {
  private readonly stack: T[] = [];

  constructor(private readonly clone: (value: T) => T = structuredClone) {}

  get size() {
    return this.stack.length;
  }

  push(state: T) {
    this.stack.push(this.clone(state));
  }

  pop(): T | undefined {
    return this.stack.pop();
  }
}
