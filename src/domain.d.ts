// Domain types shared across the application

export interface Identifiable {
  id(): string;
}

export type PersonDetails = {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly balance?: number;
};

export type StudentAttributes = {
  readonly maxConcurrentBorrows: number;
  readonly discountFactor: number;
};

export type StaffAttributes = {
  readonly canApprovePurchases: boolean;
};

export type RoleName = 'Patron' | 'Student' | 'Staff' | 'TeachingAssistant';

export type ItemKind = 'book' | 'magazine' | 'dvd';

export type ItemDetails = {
  readonly kind: ItemKind;
  readonly id: string;
  readonly title: string;
};

export type TransactionState = 'open' | 'closed';

export type FeePolicy = 'lenient' | 'strict';

export type ReturnRequest = {
  readonly userId: string;
  readonly itemId: string;
  readonly daysLate: number;
};

export type TransactionReceipt = {
  readonly userId: string;
  readonly itemId: string;
  readonly daysLate: number;
  readonly fee: number;
  readonly remainingBalance: number;
  readonly open: boolean;
};
