export class SharedState<T> {
  private value: Readonly<T>;
  private writing = false;

  constructor(initial: T) {
    this.value = initial;
  }

  read<R>(fn: (value: Readonly<T>) => R): R {
    return fn(this.value);
  }

  write(fn: (current: Readonly<T>) => T): void {
    if (this.writing) {
      throw new Error("shared state is already being written");
    }
    this.writing = true;
    try {
      this.value = fn(this.value);
    } finally {
      this.writing = false;
    }
  }
}
