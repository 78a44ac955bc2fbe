// ============================================================================
// Configuration
// ============================================================================

import {FeePolicy, StudentAttributes} from '../domain';

export type LibraryConfig = {
    readonly feePolicy: FeePolicy;
    readonly studentDefaults: StudentAttributes;
}
