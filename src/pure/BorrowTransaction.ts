/**
 * BORROW TRANSACTION
 *
 * One late return of one item by one borrower. The transaction starts open,
 * and the first successful process call charges the borrower and closes it.
 * Later calls return the stored fee without touching the balance.
 *
 * Not safe to share between concurrent callers: the open check and the
 * close are separate steps.
 */

import {TransactionState} from '../domain';
import {AlreadyClosed, InsufficientFunds, TransactionError} from './types';
import {InvalidAttributeError} from './InvalidAttributeError';
import {LibraryItem} from './items';
import {LibraryUser} from './people';
import {Either, Left, Right} from 'purify-ts';

export class BorrowTransaction {
  private state: TransactionState = 'open';
  private computedFee = 0;

  constructor(
    private readonly borrower: LibraryUser,
    private readonly item: LibraryItem,
    private readonly daysLate = 0
  ) {
    if (!Number.isInteger(daysLate) || daysLate < 0) {
      throw new InvalidAttributeError('daysLate', daysLate, 'a non-negative integer');
    }
  }

  /**
   * Charge the late fee, discounted for borrowers holding the Student role.
   * Always succeeds; a fee larger than the balance empties it.
   * @return the fee charged, or the fee already charged if closed
   */
  process(): number {
    if (this.state === 'closed') return this.computedFee;
    return this.close(this.quoteFee());
  }

  /**
   * Like {@link process}, but reports a second call or a fee the borrower
   * cannot cover instead of absorbing it. On Left nothing is changed.
   */
  processStrict(): Either<TransactionError, number> {
    if (this.state === 'closed') {
      return Left(this.alreadyClosed());
    }
    const fee = this.quoteFee();
    if (!this.borrower.person.canCover(fee)) {
      return Left(this.insufficientFunds(fee));
    }
    return Right(this.close(fee));
  }

  /** The fee this transaction would charge now, without charging it. */
  quoteFee(): number {
    const baseFee = this.item.computeLateFee(this.daysLate);
    return this.borrower.asStudent()
      .map(student => baseFee * student.getDiscountFactor())
      .orDefault(baseFee);
  }

  getUserId(): string {
    return this.borrower.id();
  }

  getItemId(): string {
    return this.item.id();
  }

  getDaysLate(): number {
    return this.daysLate;
  }

  getState(): TransactionState {
    return this.state;
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  getLateFeeCost(): number {
    return this.computedFee;
  }

  private close(fee: number): number {
    this.borrower.deduct(fee);
    this.computedFee = fee;
    this.state = 'closed';
    return fee;
  }

  private alreadyClosed(): AlreadyClosed {
    return {
      type: 'already_closed',
      userId: this.getUserId(),
      itemId: this.getItemId(),
      fee: this.computedFee,
    };
  }

  private insufficientFunds(fee: number): InsufficientFunds {
    return {
      type: 'insufficient_funds',
      userId: this.getUserId(),
      itemId: this.getItemId(),
      fee,
      balance: this.borrower.getBalance(),
    };
  }
}
