/**
 * @file Transaction Scope Helper
 *
 * @module dim/transaction
 */

import type { SurfaceTransaction } from './types.js';

/**
 * Run `body` with the transaction open, closing it even if `body` throws.
 *
 * @returns Whatever `body` returns.
 */
export function transaction_run<T>(transaction: SurfaceTransaction, body: () => T): T {
    transaction.transaction_open();
    try {
        return body();
    } finally {
        transaction.transaction_close();
    }
}
