/**
 * Locates a resource inside a possibly nested stack. Two identifiers are equal when their
 * string forms are equal.
 */
export class ResourceIdentifier {
  constructor(
    readonly stackPath: string,
    readonly logicalId: string,
  ) {}

  /**
   * Parses `Parent/Child/LogicalId`; the last segment is the logical id and the rest the stack path.
   */
  static parse(value: string): ResourceIdentifier {
    const separator = value.lastIndexOf('/');
    if (separator === -1) {
      return new ResourceIdentifier('', value);
    }
    return new ResourceIdentifier(value.slice(0, separator), value.slice(separator + 1));
  }

  static from(value: ResourceIdentifierLike): ResourceIdentifier {
    return value instanceof ResourceIdentifier ? value : ResourceIdentifier.parse(value);
  }

  equals(other: ResourceIdentifierLike): boolean {
    return this.toString() === String(other);
  }

  toString(): string {
    return this.stackPath ? `${this.stackPath}/${this.logicalId}` : this.logicalId;
  }
}

export type ResourceIdentifierLike = ResourceIdentifier | string;
