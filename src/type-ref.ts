/**
 * Interned references to types by qualified name.
 *
 * `TypeRef.of` always hands back the same object for the same name, so type
 * identity is plain object identity (`===`).
 */

const interned = new Map<string, TypeRef>();

export class TypeRef {
  readonly qualifiedName: string;

  private constructor(qualifiedName: string) {
    this.qualifiedName = qualifiedName;
    Object.freeze(this);
  }

  static of(qualifiedName: string): TypeRef {
    const name = qualifiedName.trim();
    if (name === '') {
      throw new TypeError('Type reference needs a non-empty qualified name');
    }
    let ref = interned.get(name);
    if (ref === undefined) {
      ref = new TypeRef(name);
      interned.set(name, ref);
    }
    return ref;
  }

  /** Package portion of the qualified name; `''` for the default package. */
  get packageName(): string {
    const idx = this.qualifiedName.lastIndexOf('.');
    return idx === -1 ? '' : this.qualifiedName.slice(0, idx);
  }

  get simpleName(): string {
    const idx = this.qualifiedName.lastIndexOf('.');
    return idx === -1 ? this.qualifiedName : this.qualifiedName.slice(idx + 1);
  }

  toString(): string {
    return this.qualifiedName;
  }

  toJSON(): string {
    return this.qualifiedName;
  }
}
