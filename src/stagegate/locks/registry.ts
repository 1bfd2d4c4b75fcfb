/**
 * Named custom predicates used by `custom` locks.
 */
export type CustomValidator = (value: unknown, expected: unknown) => boolean;

export class ValidatorRegistry {
  private validators = new Map<string, CustomValidator>();

  constructor(initial?: Record<string, CustomValidator>) {
    if (initial) {
      for (const [name, fn] of Object.entries(initial)) {
        this.register(name, fn);
      }
    }
  }

  /** Last registration wins. */
  register(name: string, validator: CustomValidator): this {
    if (!name) {
      throw new Error('Validator name must be a non-empty string');
    }
    this.validators.set(name, validator);
    return this;
  }

  get(name: string): CustomValidator | undefined {
    return this.validators.get(name);
  }

  has(name: string): boolean {
    return this.validators.has(name);
  }

  unregister(name: string): boolean {
    return this.validators.delete(name);
  }

  list(): string[] {
    return Array.from(this.validators.keys()).sort();
  }

  clear(): void {
    this.validators.clear();
  }

  get size(): number {
    return this.validators.size;
  }
}
