export const PLACEHOLDER_PREFIX = "class_";

// Guards against a stray huge id in a label file growing the registry unbounded
export const MAX_CLASS_ID = 9999;

const CLASS_ID_TOKEN = /^\d+$/;

export const isClassIdToken = (token: string) => CLASS_ID_TOKEN.test(token);

/**
 * Ordered, append-only table of class names. A class id is the position of its
 * name; ids are never renumbered or removed while the registry is alive.
 */
export class ClassRegistry {
  private readonly entries: string[] = [];
  private readonly ids = new Map<string, number>();

  constructor(initial: readonly string[] = []) {
    initial.forEach((raw) => {
      const name = raw.trim();
      if (name && !this.ids.has(name)) {
        this.append(name);
      } else {
        this.append(this.placeholderFor(this.entries.length));
      }
    });
  }

  get size() {
    return this.entries.length;
  }

  get names(): readonly string[] {
    return [...this.entries];
  }

  has(id: number) {
    return Number.isInteger(id) && id >= 0 && id < this.entries.length;
  }

  nameOf(id: number): string | undefined {
    return this.has(id) ? this.entries[id] : undefined;
  }

  idOf(name: string): number | undefined {
    return this.ids.get(name.trim());
  }

  /**
   * Maps an annotation-file token to a class id. Numeric tokens are ids; ids past
   * the end grow the registry with placeholder names up to and including the id.
   * Any other token is a class name, appended when unknown.
   */
  resolve(token: string): number {
    const trimmed = token.trim();
    if (!trimmed) {
      throw new RangeError("Class token is empty");
    }

    if (isClassIdToken(trimmed)) {
      const id = Number.parseInt(trimmed, 10);
      if (id > MAX_CLASS_ID) {
        throw new RangeError(`Class id ${id} exceeds the limit of ${MAX_CLASS_ID}`);
      }
      while (this.entries.length <= id) {
        this.append(this.placeholderFor(this.entries.length));
      }
      return id;
    }

    return this.addExplicit(trimmed);
  }

  addExplicit(name: string): number {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new RangeError("Class name is empty");
    }
    return this.ids.get(trimmed) ?? this.append(trimmed);
  }

  private append(name: string) {
    const id = this.entries.length;
    this.entries.push(name);
    this.ids.set(name, id);
    return id;
  }

  private placeholderFor(id: number) {
    const base = `${PLACEHOLDER_PREFIX}${id}`;
    let candidate = base;
    let suffix = 1;
    while (this.ids.has(candidate)) {
      candidate = `${base}_${suffix}`;
      suffix += 1;
    }
    return candidate;
  }
}
