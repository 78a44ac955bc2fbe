/**
 * EFFECTS LAYER
 *
 * The only IO the return workflow needs: finding the borrower, finding the
 * item, and showing the result. Lookups are by id and return null when
 * nothing matches, so a stub is a one-liner.
 */

import {LibraryUser} from './people';
import {LibraryItem} from './items';

export interface UserDirectory {
  getById(id: string): Promise<LibraryUser | null>;
}

export interface ItemCatalog {
  getById(id: string): Promise<LibraryItem | null>;
}

export interface DisplayService {
  print(lines: string[]): Promise<void>;
}

export type LibraryEffects = {
  readonly users: UserDirectory;
  readonly items: ItemCatalog;
  readonly display: DisplayService;
}
