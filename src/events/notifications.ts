import { EventEmitter } from 'node:events';
import type { Orientation, PoolParams } from '../pools/types.js';

export type LedgerEventMap = {
  'pool-created': { poolId: string; orientation: Orientation; params: PoolParams };
  'pool-updated': { poolId: string; params: PoolParams };
  deposit: { poolId: string; principal: string; amount: bigint; shares: bigint };
  withdraw: { poolId: string; principal: string; amount: bigint; shares: bigint };
  borrow: { poolId: string; principal: string; collateralAmount: bigint; borrowable: bigint; repayAmount: bigint; duration: number };
  repay: { poolId: string; principal: string; amount: bigint; remaining: bigint; collateralReleased: bigint };
  liquidate: { poolId: string; liquidator: string; borrower: string; payAmount: bigint; collateralReleased: bigint };
};

export type LedgerEventName = keyof LedgerEventMap;

/** Typed notifications, emitted only after an operation has committed. */
export class LedgerEvents {
  private readonly emitter = new EventEmitter();

  on<K extends LedgerEventName>(event: K, listener: (payload: LedgerEventMap[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => { this.emitter.off(event, listener); };
  }

  once<K extends LedgerEventName>(event: K, listener: (payload: LedgerEventMap[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends LedgerEventName>(event: K, payload: LedgerEventMap[K]): void {
    this.emitter.emit(event, payload);
  }

  removeAll(): void {
    this.emitter.removeAllListeners();
  }
}
