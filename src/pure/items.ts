/**
 * LIBRARY ITEMS
 *
 * The set of borrowable kinds is closed: each kind has one entry in
 * `itemKindRules`, and the Record type makes a new ItemKind fail to compile
 * until it has a rule. All current kinds charge linearly per day late.
 */

import {Identifiable, ItemDetails, ItemKind} from '../domain';
import {ItemKindRule} from './types';

const linearLateFee = (daysLate: number, lateFeePerDay: number): number => daysLate * lateFeePerDay;

const itemKindRules: Record<ItemKind, ItemKindRule> = {
  book: {typeName: 'Book', lateFeePerDay: 1.0, lateFee: linearLateFee},
  magazine: {typeName: 'Magazine', lateFeePerDay: 0.5, lateFee: linearLateFee},
  dvd: {typeName: 'DVD', lateFeePerDay: 2.0, lateFee: linearLateFee},
};

export class LibraryItem implements Identifiable {
  constructor(private readonly details: ItemDetails) {}

  get kind(): ItemKind {
    return this.details.kind;
  }

  id(): string {
    return this.details.id;
  }

  getTitle(): string {
    return this.details.title;
  }

  typeName(): string {
    return itemKindRules[this.details.kind].typeName;
  }

  lateFeePerDay(): number {
    return itemKindRules[this.details.kind].lateFeePerDay;
  }

  computeLateFee(daysLate: number): number {
    const rule = itemKindRules[this.details.kind];
    return rule.lateFee(daysLate, rule.lateFeePerDay);
  }
}

export function book(id: string, title: string): LibraryItem {
  return new LibraryItem({kind: 'book', id, title});
}

export function magazine(id: string, title: string): LibraryItem {
  return new LibraryItem({kind: 'magazine', id, title});
}

export function dvd(id: string, title: string): LibraryItem {
  return new LibraryItem({kind: 'dvd', id, title});
}
