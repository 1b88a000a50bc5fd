import { ANY_METHOD, type MethodKey } from "../types/index.js";

/**
 * Unordered set of request methods, with `ANY_METHOD` standing for every method.
 *
 * Builders mutate and return the same instance so sets can be chained:
 * `MethodSet.get().post()`.
 */
export class MethodSet implements Iterable<MethodKey> {
  private readonly members: Set<MethodKey>;

  constructor(methods: Iterable<MethodKey> = []) {
    this.members = new Set(methods);
  }

  static of(...methods: MethodKey[]): MethodSet {
    return new MethodSet(methods);
  }

  static get(): MethodSet {
    return MethodSet.of("GET");
  }

  static post(): MethodSet {
    return MethodSet.of("POST");
  }

  static put(): MethodSet {
    return MethodSet.of("PUT");
  }

  static delete(): MethodSet {
    return MethodSet.of("DELETE");
  }

  static any(): MethodSet {
    return MethodSet.of(ANY_METHOD);
  }

  get size(): number {
    return this.members.size;
  }

  get(): this {
    return this.add("GET");
  }

  post(): this {
    return this.add("POST");
  }

  put(): this {
    return this.add("PUT");
  }

  delete(): this {
    return this.add("DELETE");
  }

  any(): this {
    return this.add(ANY_METHOD);
  }

  add(method: MethodKey): this {
    this.members.add(method);
    return this;
  }

  remove(method: MethodKey): this {
    this.members.delete(method);
    return this;
  }

  /** Unions `other` into this set. */
  merge(other: Iterable<MethodKey>): this {
    for (const method of other) {
      this.members.add(method);
    }
    return this;
  }

  copy(): MethodSet {
    return new MethodSet(this.members);
  }

  has(method: MethodKey): boolean {
    return this.members.has(method);
  }

  hasOrAny(method: MethodKey): boolean {
    return this.members.has(method) || this.members.has(ANY_METHOD);
  }

  [Symbol.iterator](): Iterator<MethodKey> {
    return this.members.values();
  }
}
