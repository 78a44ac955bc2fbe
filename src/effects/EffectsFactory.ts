/**
 * IN-MEMORY EFFECTS IMPLEMENTATION
 *
 * Users and items live in maps built once per run; results go to the
 * console. Configuration comes from environment variables.
 */
import {FeePolicy, StudentAttributes} from '../domain';
import {LibraryConfig} from './types';
import {DisplayService, ItemCatalog, LibraryEffects, UserDirectory} from '../pure/effects';
import {LibraryItem} from '../pure/items';
import {DEFAULT_STUDENT_ATTRIBUTES, LibraryUser, validateStudentAttributes} from '../pure/people';

// ============================================================================
// Configuration
// ============================================================================

const feePolicies: readonly FeePolicy[] = ['lenient', 'strict'];

function parseFeePolicy(value: string): FeePolicy {
  const policy = feePolicies.find(p => p === value);
  if (!policy) {
    throw new Error(`LIBRARY_FEE_POLICY must be one of ${feePolicies.join(', ')}, got '${value}'`);
  }
  return policy;
}

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LibraryConfig {
  const studentDefaults: StudentAttributes = {
    maxConcurrentBorrows: parseInt(
      env.LIBRARY_STUDENT_MAX_BORROWS || String(DEFAULT_STUDENT_ATTRIBUTES.maxConcurrentBorrows), 10),
    discountFactor: parseFloat(
      env.LIBRARY_STUDENT_DISCOUNT || String(DEFAULT_STUDENT_ATTRIBUTES.discountFactor)),
  };

  return {
    feePolicy: parseFeePolicy(env.LIBRARY_FEE_POLICY || 'lenient'),
    studentDefaults: validateStudentAttributes(studentDefaults),
  };
}

// ============================================================================
// In-memory Directory and Catalog
// ============================================================================

class InMemoryUserDirectory implements UserDirectory {
  private readonly users: Map<string, LibraryUser>;

  constructor(users: LibraryUser[]) {
    this.users = new Map(users.map(user => [user.id(), user]));
  }

  async getById(id: string): Promise<LibraryUser | null> {
    return this.users.get(id) ?? null;
  }
}

class InMemoryItemCatalog implements ItemCatalog {
  private readonly items: Map<string, LibraryItem>;

  constructor(items: LibraryItem[]) {
    this.items = new Map(items.map(item => [item.id(), item]));
  }

  async getById(id: string): Promise<LibraryItem | null> {
    return this.items.get(id) ?? null;
  }
}

// ============================================================================
// Console Display
// ============================================================================

class ConsoleDisplayService implements DisplayService {
  async print(lines: string[]): Promise<void> {
    lines.forEach(line => console.log(line));
  }
}

export type LibrarySeed = {
  readonly users: LibraryUser[];
  readonly items: LibraryItem[];
};

export function makeAppEffects(seed: LibrarySeed): LibraryEffects {
  return {
    users: new InMemoryUserDirectory(seed.users),
    items: new InMemoryItemCatalog(seed.items),
    display: new ConsoleDisplayService(),
  };
}
