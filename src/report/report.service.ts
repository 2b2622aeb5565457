import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { plantConfig } from '../config/plant.config';
import { LinkDisconnectedEvent } from '../modbus/interfaces/modbus.interface';
import { CycleCompletedEvent, StateChangedEvent } from '../orchestrator/interfaces/orchestrator.interface';
import { AssetCounts, SimulationLoadedEvent } from '../simulation/interfaces/network.interface';

const OVERVIEW_ROWS: Array<[keyof AssetCounts, string]> = [
	['junction', 'junctions'],
	['reservoir', 'reservoirs'],
	['tank', 'tanks'],
	['pipe', 'pipes'],
	['pump', 'pumps'],
	['valve', 'valves'],
];

/**
 * Сводка по сети: количество объектов каждого класса, подписи выровнены по правому краю
 */
export function formatNetworkOverview(counts: AssetCounts): string[] {
	const width = Math.max(...OVERVIEW_ROWS.map(([, label]) => label.length));
	return [
		'Network Overview:',
		'-'.repeat(32),
		...OVERVIEW_ROWS.map(([assetClass, label]) => `${label.padStart(width)} : ${counts[assetClass]}`),
	];
}

function range(values: number[]): string {
	if (values.length === 0) {
		return 'n/a';
	}
	return `${Math.min(...values).toFixed(2)}..${Math.max(...values).toFixed(2)}`;
}

export function formatCycleStatus(event: CycleCompletedEvent): string {
	const { controls, telemetry } = event;
	const openPipes = controls.pipeStatuses.filter(Boolean).length;
	const pumps = controls.pumpSettings.map((setting) => setting.toFixed(2)).join(', ');

	return [
		`Cycle ${event.cycle} (t=${event.simulatedSeconds}s)`,
		`pipes open ${openPipes}/${controls.pipeStatuses.length}`,
		`pump settings [${pumps}]`,
		`pressure ${range(telemetry.junctionPressures)}`,
		`tank head ${range(telemetry.tankHeads)}`,
		`pump flow ${range(telemetry.pumpFlows)}`,
	].join(' | ');
}

/**
 * Консольный вывод процесса по событиям сервисов
 */
@Injectable()
export class ReportService {
	private readonly logger = new Logger(ReportService.name);

	constructor(
		private readonly eventEmitter: EventEmitter2,
		@Inject(plantConfig.KEY)
		private readonly config: ConfigType<typeof plantConfig>,
	) {
		this.eventEmitter.on('simulation.loaded', (event: SimulationLoadedEvent) => this.handleNetworkLoaded(event));
		this.eventEmitter.on('orchestrator.state', (event: StateChangedEvent) => this.handleStateChanged(event));
		this.eventEmitter.on('cycle.completed', (event: CycleCompletedEvent) => this.handleCycleCompleted(event));
		this.eventEmitter.on('link.disconnected', (event: LinkDisconnectedEvent) => this.handleLinkDisconnected(event));
	}

	private handleNetworkLoaded(event: SimulationLoadedEvent): void {
		for (const line of formatNetworkOverview(event.counts)) {
			this.logger.log(line);
		}
		this.logger.log(`Hydraulic step: ${event.hydraulicStepSeconds}s, cycle interval: ${this.config.cycle.intervalMs}ms`);
	}

	private handleStateChanged(event: StateChangedEvent): void {
		this.logger.log(`State: ${event.from} → ${event.to}`);
	}

	private handleCycleCompleted(event: CycleCompletedEvent): void {
		const every = this.config.cycle.statusEveryCycles;
		if (every > 0 && event.cycle % every === 0) {
			this.logger.log(formatCycleStatus(event));
		} else {
			this.logger.debug(formatCycleStatus(event));
		}
	}

	private handleLinkDisconnected(event: LinkDisconnectedEvent): void {
		if (event.reason === 'io_error') {
			this.logger.warn('⚠️  Modbus TCP link lost during I/O');
		}
	}
}
