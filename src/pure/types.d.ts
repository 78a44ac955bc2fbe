// Module product types

export type InsufficientFunds = {
    readonly type: 'insufficient_funds';
    readonly userId: string;
    readonly itemId: string;
    readonly fee: number;
    readonly balance: number;
};

export type AlreadyClosed = {
    readonly type: 'already_closed';
    readonly userId: string;
    readonly itemId: string;
    readonly fee: number;
};

export type TransactionError = InsufficientFunds | AlreadyClosed;

export type ItemKindRule = {
    readonly typeName: string;
    readonly lateFeePerDay: number;
    readonly lateFee: (daysLate: number, lateFeePerDay: number) => number;
};
