import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { plantConfig } from './config/plant.config';
import { OrchestratorModule } from './orchestrator/orchestrator.module';
import { ReportModule } from './report/report.module';

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
			load: [plantConfig],
		}),
		EventEmitterModule.forRoot({
			global: true,
			maxListeners: 100,
			ignoreErrors: false,
		}),
		OrchestratorModule,
		ReportModule,
	],
})
export class AppModule {}
