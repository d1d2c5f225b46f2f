import { Module } from '@nestjs/common';
import { RiskManagementService } from './risk-management.service';
import { PositionSizingService } from './services/position-sizing.service';
import { CircuitBreakerService } from './services/circuit-breaker.service';
import { LeverageSelectorService } from './services/leverage-selector.service';
import { DiversificationService } from './services/diversification.service';

@Module({
  providers: [
    RiskManagementService,
    PositionSizingService,
    CircuitBreakerService,
    LeverageSelectorService,
    DiversificationService,
  ],
  exports: [
    RiskManagementService,
    PositionSizingService,
    CircuitBreakerService,
    LeverageSelectorService,
    DiversificationService,
  ],
})
export class RiskManagementModule {}
