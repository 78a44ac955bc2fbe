/**
 * PURE BUSINESS LOGIC
 *
 * Fee settlement and report building. These functions read entities and
 * return values; the only mutation is the charge made by settling a
 * transaction, which the transaction itself owns.
 *
 * Note that for simplicity currency and correct decimal precision are not
 * integrated into fee calculations.
 */

import {FeePolicy, TransactionReceipt} from '../domain';
import {TransactionError} from './types';
import {BorrowTransaction} from './BorrowTransaction';
import {LibraryItem} from './items';
import {LibraryUser} from './people';
import {Either, Right} from 'purify-ts';

// ============================================================================
// Settlement
// ============================================================================

const settlementStrategies: Record<FeePolicy, (tx: BorrowTransaction) => Either<TransactionError, number>> = {
  lenient: (tx) => Right(tx.process()),
  strict: (tx) => tx.processStrict(),
};

export function settleTransaction(
  tx: BorrowTransaction,
  policy: FeePolicy
): Either<TransactionError, number> {
  return settlementStrategies[policy](tx);
}

export function describeTransactionError(error: TransactionError): string {
  switch (error.type) {
    case 'insufficient_funds':
      return `User ${error.userId} cannot cover fee ${error.fee.toFixed(2)} for item ${error.itemId} (balance ${error.balance.toFixed(2)})`;
    case 'already_closed':
      return `Transaction for user ${error.userId} and item ${error.itemId} is already closed (fee ${error.fee.toFixed(2)})`;
  }
}

// ============================================================================
// Reports
// ============================================================================

// Six significant digits, trailing zeros dropped: 0.1 + 0.2 prints as 0.3.
export function formatAmount(amount: number): string {
  return String(Number(amount.toPrecision(6)));
}

export function describeUser(user: LibraryUser): string[] {
  const header = `${user.getName()} (${user.id()}) | Email: ${user.getEmail()} | Balance: ${formatAmount(user.getBalance())}`;
  const roleSegments = [
    ...user.asStudent()
      .map(student => [
        `MaxBorrows: ${student.getMaxConcurrentBorrows()}`,
        `Discount: ${formatAmount(student.getDiscountFactor())}`,
      ])
      .orDefault([]),
    ...user.asStaff()
      .map(staff => [`PurchaseApproval: ${staff.hasPurchaseApproval() ? 'Yes' : 'No'}`])
      .orDefault([]),
  ];

  if (roleSegments.length === 0) return [header];
  return [header, [`  Role: ${user.roleName()}`, ...roleSegments].join(' | ')];
}

export function describeItem(item: LibraryItem): string {
  return `${item.id()} | ${item.getTitle()} | ${item.typeName()} | fee/day: ${formatAmount(item.lateFeePerDay())}`;
}

export function toTransactionReceipt(
  tx: BorrowTransaction,
  borrower: LibraryUser
): TransactionReceipt {
  return {
    userId: tx.getUserId(),
    itemId: tx.getItemId(),
    daysLate: tx.getDaysLate(),
    fee: tx.getLateFeeCost(),
    remainingBalance: borrower.getBalance(),
    open: tx.isOpen(),
  };
}

export function buildTransactionSummary(receipt: TransactionReceipt): string[] {
  return [
    `User: ${receipt.userId} | Item: ${receipt.itemId}`,
    `Days late: ${receipt.daysLate} | Fee charged: ${receipt.fee.toFixed(2)}`,
    `Remaining balance: ${receipt.remainingBalance.toFixed(2)}`,
    `Transaction open: ${receipt.open ? 'Yes' : 'No'}`,
  ];
}
