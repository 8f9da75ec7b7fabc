/**
 * Value Object
 *
 * Base class for value objects: objects defined by their attributes, not
 * identity. Props are frozen on construction and equality compares them
 * field by field.
 *
 * @module
 */

export type Primitive = string | number | boolean | null;

/**
 * Base class for value objects
 */
export abstract class ValueObject<T extends Record<string, Primitive>> {
  protected readonly props: Readonly<T>;

  constructor(props: T) {
    this.props = Object.freeze({ ...props });
  }

  /**
   * Check equality based on properties
   */
  equals(other: ValueObject<T> | null | undefined): boolean {
    if (!other) return false;
    if (this === other) return true;
    if (other.constructor !== this.constructor) return false;

    const keys = Object.keys(this.props);
    if (keys.length !== Object.keys(other.props).length) return false;

    return keys.every((key) => this.props[key] === other.props[key]);
  }
}
