import {BorrowTransaction} from '../pure/BorrowTransaction';
import {InvalidAttributeError} from '../pure/InvalidAttributeError';
import {book, dvd, magazine} from '../pure/items';
import {createPatron, createStaff, createStudent, createTeachingAssistant} from '../pure/people';

const sampleBook = () => book('B001', 'A Book');

describe('BorrowTransaction.process', () => {
  it('charges a patron the full fee', () => {
    const borrower = createPatron({ id: 'U1', name: 'Patron', email: 'u1@example.com', balance: 20 });
    const tx = new BorrowTransaction(borrower, sampleBook(), 5);

    expect(tx.process()).toBe(5);
    expect(borrower.getBalance()).toBe(15);
  });

  it('discounts the fee for a student', () => {
    const borrower = createStudent(
      { id: 'S100', name: 'Student', email: 's@example.com', balance: 50 },
      { maxConcurrentBorrows: 2, discountFactor: 0.8 }
    );
    const tx = new BorrowTransaction(borrower, sampleBook(), 5);

    expect(tx.process()).toBeCloseTo(4);
    expect(borrower.getBalance()).toBeCloseTo(46);
  });

  it('charges staff the full fee and floors their balance at zero', () => {
    const borrower = createStaff(
      { id: 'ST200', name: 'Staff', email: 'st@example.com', balance: 3 },
      { canApprovePurchases: false }
    );
    const tx = new BorrowTransaction(borrower, magazine('M010', 'A Magazine'), 10);

    expect(tx.process()).toBe(5);
    expect(tx.getLateFeeCost()).toBe(5);
    expect(borrower.getBalance()).toBe(0);
  });

  it('applies the student discount to a teaching assistant', () => {
    const borrower = createTeachingAssistant(
      { id: 'TA300', name: 'Assistant', email: 'ta@example.com', balance: 60 },
      { maxConcurrentBorrows: 2, discountFactor: 0.85 },
      { canApprovePurchases: true }
    );
    const tx = new BorrowTransaction(borrower, dvd('D100', 'A Disc'), 3);

    expect(tx.process()).toBeCloseTo(5.1);
    expect(borrower.getBalance()).toBeCloseTo(54.9);
  });

  it('charges nothing for an on-time return but still closes', () => {
    const borrower = createPatron({ id: 'U1', name: 'Patron', email: 'u1@example.com', balance: 20 });
    const tx = new BorrowTransaction(borrower, sampleBook());

    expect(tx.process()).toBe(0);
    expect(tx.isOpen()).toBe(false);
    expect(borrower.getBalance()).toBe(20);
  });

  it('deducts only once when processed repeatedly', () => {
    const borrower = createPatron({ id: 'U1', name: 'Patron', email: 'u1@example.com', balance: 20 });
    const tx = new BorrowTransaction(borrower, sampleBook(), 5);

    const fees = [tx.process(), tx.process(), tx.process()];

    expect(fees).toEqual([5, 5, 5]);
    expect(borrower.getBalance()).toBe(15);
  });

  it('does not recompute after the borrower changes', () => {
    const borrower = createPatron({ id: 'U1', name: 'Patron', email: 'u1@example.com', balance: 2 });
    const tx = new BorrowTransaction(borrower, sampleBook(), 5);

    tx.process();
    borrower.addFunds(100);

    expect(tx.process()).toBe(5);
    expect(borrower.getBalance()).toBe(100);
  });
});

describe('BorrowTransaction state', () => {
  const borrower = () => createPatron({ id: 'U1', name: 'Patron', email: 'u1@example.com', balance: 20 });

  it('starts open with no fee', () => {
    const tx = new BorrowTransaction(borrower(), sampleBook(), 2);

    expect(tx.isOpen()).toBe(true);
    expect(tx.getState()).toBe('open');
    expect(tx.getLateFeeCost()).toBe(0);
  });

  it('stays closed after processing', () => {
    const tx = new BorrowTransaction(borrower(), sampleBook(), 2);

    tx.process();
    expect(tx.isOpen()).toBe(false);
    tx.process();
    expect(tx.isOpen()).toBe(false);
    expect(tx.getState()).toBe('closed');
  });

  it('reports user, item and days late in either state', () => {
    const tx = new BorrowTransaction(borrower(), sampleBook(), 2);

    expect([tx.getUserId(), tx.getItemId(), tx.getDaysLate()]).toEqual(['U1', 'B001', 2]);
    tx.process();
    expect([tx.getUserId(), tx.getItemId(), tx.getDaysLate()]).toEqual(['U1', 'B001', 2]);
  });

  it('quotes a fee without charging it', () => {
    const payer = borrower();
    const tx = new BorrowTransaction(payer, sampleBook(), 2);

    expect(tx.quoteFee()).toBe(2);
    expect(tx.isOpen()).toBe(true);
    expect(payer.getBalance()).toBe(20);
  });

  it('rejects negative or fractional days late', () => {
    expect(() => new BorrowTransaction(borrower(), sampleBook(), -1)).toThrow(InvalidAttributeError);
    expect(() => new BorrowTransaction(borrower(), sampleBook(), 1.5))
      .toThrow('daysLate must be a non-negative integer, got 1.5');
  });
});

describe('BorrowTransaction.processStrict', () => {
  const staffWith = (balance: number) => createStaff(
    { id: 'ST200', name: 'Staff', email: 'st@example.com', balance },
    { canApprovePurchases: true }
  );

  it('charges when the balance covers the fee', () => {
    const borrower = staffWith(10);
    const tx = new BorrowTransaction(borrower, magazine('M010', 'A Magazine'), 10);

    const result = tx.processStrict();

    expect(result.isRight()).toBe(true);
    expect(result.extract()).toBe(5);
    expect(borrower.getBalance()).toBe(5);
    expect(tx.isOpen()).toBe(false);
  });

  it('charges when the balance exactly covers the fee', () => {
    const borrower = staffWith(5);
    const tx = new BorrowTransaction(borrower, magazine('M010', 'A Magazine'), 10);

    expect(tx.processStrict().extract()).toBe(5);
    expect(borrower.getBalance()).toBe(0);
  });

  it('reports insufficient funds and changes nothing', () => {
    const borrower = staffWith(3);
    const tx = new BorrowTransaction(borrower, magazine('M010', 'A Magazine'), 10);

    const result = tx.processStrict();

    expect(result.isLeft()).toBe(true);
    expect(result.extract()).toEqual({
      type: 'insufficient_funds',
      userId: 'ST200',
      itemId: 'M010',
      fee: 5,
      balance: 3,
    });
    expect(borrower.getBalance()).toBe(3);
    expect(tx.isOpen()).toBe(true);
    expect(tx.getLateFeeCost()).toBe(0);
  });

  it('can be retried after a top-up', () => {
    const borrower = staffWith(3);
    const tx = new BorrowTransaction(borrower, magazine('M010', 'A Magazine'), 10);

    tx.processStrict();
    borrower.addFunds(10);

    expect(tx.processStrict().extract()).toBe(5);
    expect(borrower.getBalance()).toBe(8);
  });

  it('reports a second call as already closed', () => {
    const borrower = staffWith(10);
    const tx = new BorrowTransaction(borrower, magazine('M010', 'A Magazine'), 10);

    tx.processStrict();
    const second = tx.processStrict();

    expect(second.extract()).toEqual({
      type: 'already_closed',
      userId: 'ST200',
      itemId: 'M010',
      fee: 5,
    });
    expect(borrower.getBalance()).toBe(5);
  });

  it('reports a lenient transaction as already closed', () => {
    const tx = new BorrowTransaction(staffWith(10), magazine('M010', 'A Magazine'), 2);

    tx.process();

    expect(tx.processStrict().isLeft()).toBe(true);
  });
});
