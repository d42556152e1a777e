/**
 * Catalogue
 *
 * Title -> live price accessor for every item currently on sale. A title is
 * present exactly while its decay timer runs.
 */

import { ProtocolError } from "@decay-market/sdk";
import type { ListingSnapshot, PriceAccessor } from "./types";

export class Catalogue {
  private entries = new Map<string, PriceAccessor>();

  register(accessor: PriceAccessor): void {
    if (this.entries.has(accessor.title)) {
      throw new ProtocolError(`Item "${accessor.title}" is already on sale`, "ALREADY_LISTED", {
        title: accessor.title,
      });
    }
    this.entries.set(accessor.title, accessor);
  }

  lookup(title: string): PriceAccessor | undefined {
    return this.entries.get(title);
  }

  has(title: string): boolean {
    return this.entries.has(title);
  }

  /**
   * Returns false when the title was not listed.
   */
  remove(title: string): boolean {
    return this.entries.delete(title);
  }

  get size(): number {
    return this.entries.size;
  }

  titles(): string[] {
    return [...this.entries.keys()];
  }

  accessors(): PriceAccessor[] {
    return [...this.entries.values()];
  }

  snapshot(): ListingSnapshot[] {
    return this.accessors().map((accessor) => accessor.snapshot());
  }
}
