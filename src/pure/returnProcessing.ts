/**
 * RETURN PROCESSOR - The Coordinator
 *
 * The thin effectful shell around a late return:
 * 1. Looks up the borrower and the item (effects)
 * 2. Settles a borrow transaction (pure, apart from the charge itself)
 * 3. Shows the receipt (effects)
 */

import {FeePolicy, ReturnRequest, TransactionReceipt} from '../domain';
import {LibraryEffects} from './effects';
import {BorrowTransaction} from './BorrowTransaction';
import {LibraryItem} from './items';
import {LibraryUser} from './people';
import {buildTransactionSummary, describeTransactionError, settleTransaction, toTransactionReceipt} from './businessLogic';
import {EffectsError} from '../effects/EffectsError';
import {Either, EitherAsync, Left, NonEmptyList, Right} from 'purify-ts';

type ReturnDetails = {
    readonly borrower: LibraryUser;
    readonly item: LibraryItem;
    readonly daysLate: number;
};

/**
 * Process a late return.
 *
 * @param request who returned what, and how many days late
 * @param feePolicy 'lenient' absorbs insufficient funds, 'strict' reports them
 * @return a function to process the return using the given effects returning
 * either the business failures or the receipt of the charge
 * @throws EffectsError
 */
export function returnItem(
    request: ReturnRequest,
    feePolicy: FeePolicy = 'lenient'
): (effects: LibraryEffects) => Promise<Either<NonEmptyList<string>, TransactionReceipt>> {
    return async (effects: LibraryEffects) => {
        const details = await fetchReturnDetails(request)(effects);
        const processed = details.chain(d => doProcessReturn(d, feePolicy));
        return processed.caseOf<Promise<Either<NonEmptyList<string>, TransactionReceipt>>>({
            Left: async (errors) => Left(errors),
            Right: async (receipt) => Right(await finaliseReturn(receipt)(effects)),
        });
    };
}

function fetchReturnDetails(
    request: ReturnRequest
): (effects: LibraryEffects) => Promise<Either<NonEmptyList<string>, ReturnDetails>> {
    return async (effects: LibraryEffects) => {
        const {userId, itemId, daysLate} = request;
        if (!Number.isInteger(daysLate) || daysLate < 0) {
            return Left(NonEmptyList([`Days late must be a non-negative integer, got ${daysLate}`]));
        }

        const [borrower, item] = await Promise.all([
            effects.users.getById(userId),
            effects.items.getById(itemId),
        ]);

        const missing = [
            ...(borrower ? [] : [`User ${userId} not found`]),
            ...(item ? [] : [`Item ${itemId} not found`]),
        ];
        if (!borrower || !item) {
            return Left(NonEmptyList.unsafeCoerce(missing));
        }

        return Right({borrower, item, daysLate});
    };
}

function doProcessReturn(
    details: ReturnDetails,
    feePolicy: FeePolicy
): Either<NonEmptyList<string>, TransactionReceipt> {
    const tx = new BorrowTransaction(details.borrower, details.item, details.daysLate);
    return settleTransaction(tx, feePolicy)
        .map(() => toTransactionReceipt(tx, details.borrower))
        .mapLeft(error => NonEmptyList([describeTransactionError(error)]));
}

function finaliseReturn(
    receipt: TransactionReceipt
): (effects: LibraryEffects) => Promise<TransactionReceipt> {
    return async (effects: LibraryEffects) => {
        const result = await EitherAsync(() => effects.display.print(buildTransactionSummary(receipt))).run();
        const errors = Either.lefts([result])
            .map(err => (err instanceof Error) ? err : new Error(String(err)));
        if (errors.length) throw new EffectsError(errors, ['display']);
        return receipt;
    };
}
