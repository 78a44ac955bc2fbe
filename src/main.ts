/**
 * DEMO RUN
 *
 * Builds three users and three items, tops up balances, then returns one
 * book five days late and prints the receipt.
 *
 * Run this with: npm run demo
 */
import {LibraryConfig} from './effects/types';
import {loadConfigFromEnv, LibrarySeed, makeAppEffects} from './effects/EffectsFactory';
import {LibraryEffects} from './pure/effects';
import {book, dvd, magazine} from './pure/items';
import {createStaff, createStudent, createTeachingAssistant} from './pure/people';
import {describeItem, describeUser} from './pure/businessLogic';
import {returnItem} from './pure/returnProcessing';

function buildSeed(config: LibraryConfig): LibrarySeed {
  return {
    users: [
      createStudent({id: 'S100', name: 'Amina', email: 'amina@uni.edu', balance: 50}, config.studentDefaults),
      createStaff({id: 'ST200', name: 'Omar', email: 'omar@uni.edu', balance: 75}, {canApprovePurchases: true}),
      createTeachingAssistant(
        {id: 'TA300', name: 'Lina', email: 'lina@uni.edu', balance: 60},
        {maxConcurrentBorrows: 2, discountFactor: 0.85},
        {canApprovePurchases: true}
      ),
    ],
    items: [
      book('B001', 'Effective TypeScript'),
      magazine('M010', 'Tech Monthly'),
      dvd('D100', 'Design Patterns'),
    ],
  };
}

async function printSection(effects: LibraryEffects, title: string, lines: string[]): Promise<void> {
  await effects.display.print(['', `=== ${title} ===`, ...lines]);
}

async function main() {
  const config = loadConfigFromEnv();
  console.log(`📋 Fee policy: ${config.feePolicy}`);

  const seed = buildSeed(config);
  const effects = makeAppEffects(seed);

  await printSection(effects, 'Users', seed.users.flatMap(describeUser));

  const topUps: Record<string, number> = {S100: 20, ST200: 10, TA300: 5};
  seed.users.forEach(user => user.addFunds(topUps[user.id()] ?? 0));
  await printSection(effects, 'Users After Adding Funds', seed.users.flatMap(describeUser));

  await printSection(effects, 'Library Items', seed.items.map(describeItem));

  await printSection(effects, 'Transaction Summary', []);
  const result = await returnItem({userId: 'S100', itemId: 'B001', daysLate: 5}, config.feePolicy)(effects);
  result.ifLeft(errors => errors.forEach(error => console.error(`❌ ${error}`)));
}

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
