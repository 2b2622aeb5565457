import { Module } from '@nestjs/common';
import { EpanetEngineFactory } from './engine/epanet.engine';
import { HYDRAULIC_ENGINE_FACTORY } from './engine/hydraulic-engine.interface';
import { SimulationService } from './simulation.service';

@Module({
	providers: [
		{ provide: HYDRAULIC_ENGINE_FACTORY, useClass: EpanetEngineFactory },
		SimulationService,
	],
	exports: [SimulationService],
})
export class SimulationModule {}
