import { InstrumentAllocation } from '../../allocation/interfaces/allocation.interface';
import { CircuitBreakerState } from '../../risk-management/interfaces/risk-management.interface';
import { LifecycleState } from '../../position/interfaces/position.interface';

export interface AllocationReport {
  cycle: number;
  totalBalance: number;
  reservedBalance: number;
  availableBalance: number;
  totalAllocated: number;
  instruments: (InstrumentAllocation & { state: LifecycleState })[];
  trippedBreakers: CircuitBreakerState[];
}
