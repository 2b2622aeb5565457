import { Module } from '@nestjs/common';
import { ModbusModule } from '../modbus/modbus.module';
import { SimulationModule } from '../simulation/simulation.module';
import { CycleOrchestratorService } from './cycle-orchestrator.service';

@Module({
	imports: [ModbusModule, SimulationModule],
	providers: [CycleOrchestratorService],
	exports: [CycleOrchestratorService],
})
export class OrchestratorModule {}
