import type { Id } from '@cratedoc/rustdoc';

/**
 * Identifies an item across every loaded package
 */
export class ItemId {
  readonly packageName: string;
  readonly id: Id;

  constructor(packageName: string, id: Id) {
    this.packageName = packageName;
    this.id = id;
  }

  /**
   * Map key; equal ids always produce equal keys
   */
  get key(): string {
    return JSON.stringify([this.packageName, this.id]);
  }

  equals(other: ItemId): boolean {
    return this.packageName === other.packageName && this.id === other.id;
  }

  toString(): string {
    return `${this.packageName}#${this.id}`;
  }
}
