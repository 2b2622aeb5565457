import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { delay } from '../common/delay';
import { describeError, isPlantError, SimulationError } from '../common/errors';
import { plantConfig } from '../config/plant.config';
import { LinkState } from '../modbus/interfaces/modbus.interface';
import { ModbusLinkService } from '../modbus/modbus-link.service';
import { ModbusRegistersMapper } from '../modbus/modbus-registers.mapper';
import { ControlFrame, TelemetryFrame } from '../simulation/interfaces/network.interface';
import { SimulationService } from '../simulation/simulation.service';
import {
	CycleCompletedEvent,
	ExitCode,
	OrchestratorState,
	PhaseOutcome,
	RunLifecycle,
	RunResult,
	StateChangedEvent,
} from './interfaces/orchestrator.interface';

/**
 * Цикл обмена ПЛК <-> гидравлическая модель
 *
 * Starting -> Running -> Draining -> Stopped
 * Каждый цикл: чтение управления -> применение -> шаг модели -> телеметрия -> запись -> пауза.
 * Любая ошибка в цикле прерывает весь запуск. Остановка пользователем проверяется
 * только между циклами.
 */
@Injectable()
export class CycleOrchestratorService {
	private readonly logger = new Logger(CycleOrchestratorService.name);
	private currentState = OrchestratorState.IDLE;
	private readonly stopController = new AbortController();

	constructor(
		private readonly link: ModbusLinkService,
		private readonly mapper: ModbusRegistersMapper,
		private readonly simulation: SimulationService,
		@Inject(plantConfig.KEY)
		private readonly config: ConfigType<typeof plantConfig>,
		private readonly eventEmitter: EventEmitter2,
	) {}

	get state(): OrchestratorState {
		return this.currentState;
	}

	get stopRequested(): boolean {
		return this.stopController.signal.aborted;
	}

	/**
	 * Запросить остановку (SIGINT/SIGTERM). Текущий цикл доводится до конца.
	 */
	requestStop(): void {
		if (this.stopController.signal.aborted) {
			return;
		}
		this.logger.log('🛑 Stop requested, finishing current cycle...');
		this.stopController.abort();
	}

	async run(networkFile: string): Promise<RunResult> {
		if (this.currentState !== OrchestratorState.IDLE) {
			throw new Error(`Orchestrator has already been started (state: ${this.currentState})`);
		}

		const lifecycle: RunLifecycle = {
			networkFile,
			linkOpened: false,
			networkLoaded: false,
			analysisStarted: false,
			cycles: 0,
		};

		this.transition(OrchestratorState.STARTING);
		const started = await this.attempt('start', () => this.start(lifecycle));

		if (!started.ok) {
			lifecycle.failure = started.error;
		} else if (lifecycle.analysisStarted && !this.stopRequested) {
			this.transition(OrchestratorState.RUNNING);
			const running = await this.attempt('run', () => this.runLoop(lifecycle));
			if (!running.ok) {
				lifecycle.failure = running.error;
			}
		}

		this.transition(OrchestratorState.DRAINING);
		await this.drain(lifecycle);

		this.transition(OrchestratorState.STOPPED);
		return this.finish(lifecycle);
	}

	private async start(lifecycle: RunLifecycle): Promise<void> {
		const { host, port } = this.config.modbus;
		this.logger.log(`Connecting to Modbus TCP endpoint ${host}:${port}...`);

		const linkState = await this.link.connect(host, port, this.stopController.signal);
		if (linkState !== LinkState.CONNECTED) {
			return;
		}
		lifecycle.linkOpened = true;

		await this.simulation.load(lifecycle.networkFile);
		lifecycle.networkLoaded = true;

		this.mapper.assertNetworkFits(this.simulation.assetCounts());

		this.simulation.beginContinuousAnalysis();
		lifecycle.analysisStarted = true;
	}

	private async runLoop(lifecycle: RunLifecycle): Promise<void> {
		const signal = this.stopController.signal;
		while (!signal.aborted) {
			await this.runCycle(lifecycle);
			await delay(this.config.cycle.intervalMs, signal);
		}
	}

	private async runCycle(lifecycle: RunLifecycle): Promise<void> {
		const controls = await this.pullControlFrame();
		this.applyControlFrame(controls);

		const simulatedSeconds = this.simulation.step();

		const telemetry = this.readTelemetryFrame();
		await this.pushTelemetryFrame(telemetry);

		lifecycle.cycles++;
		this.eventEmitter.emit('cycle.completed', {
			cycle: lifecycle.cycles,
			simulatedSeconds,
			controls,
			telemetry,
		} satisfies CycleCompletedEvent);
	}

	private async pullControlFrame(): Promise<ControlFrame> {
		const coilRange = this.mapper.coilRange;
		const holdingRange = this.mapper.holdingRange;

		const coils = await this.link.readCoils(coilRange.address, coilRange.count);
		const holdingRegisters = await this.link.readHoldingRegisters(holdingRange.address, holdingRange.count);

		return this.mapper.decodeControlFrame(
			{ coils, holdingRegisters },
			this.simulation.assetIndices('pipe').length,
			this.simulation.assetIndices('pump').length,
		);
	}

	/**
	 * Сначала все трубы, затем все насосы - порядок фиксирован для воспроизводимости
	 */
	private applyControlFrame(controls: ControlFrame): void {
		const pipes = this.simulation.assetIndices('pipe');
		for (let i = 0; i < pipes.length; i++) {
			this.simulation.setPipeStatus(pipes[i], controls.pipeStatuses[i]);
		}

		const pumps = this.simulation.assetIndices('pump');
		for (let i = 0; i < pumps.length; i++) {
			this.simulation.setPumpSetting(pumps[i], controls.pumpSettings[i]);
		}
	}

	private readTelemetryFrame(): TelemetryFrame {
		return {
			junctionPressures: this.simulation.assetIndices('junction').map((index) => this.simulation.readPressure(index)),
			tankHeads: this.simulation.assetIndices('tank').map((index) => this.simulation.readHead(index)),
			pumpFlows: this.simulation.assetIndices('pump').map((index) => this.simulation.readFlow(index)),
		};
	}

	private async pushTelemetryFrame(telemetry: TelemetryFrame): Promise<void> {
		for (const block of this.mapper.encodeTelemetryFrame(telemetry)) {
			await this.link.writeRegisters(block.address, block.values);
		}
	}

	/**
	 * Освобождение ресурсов выполняется всегда; ошибки только логируются
	 */
	private async drain(lifecycle: RunLifecycle): Promise<void> {
		if (lifecycle.linkOpened) {
			try {
				await this.link.close();
			} catch (error) {
				this.logger.error(`Failed to close Modbus TCP connection: ${describeError(error)}`);
			}
		}

		if (lifecycle.networkLoaded) {
			try {
				this.simulation.endContinuousAnalysis();
			} catch (error) {
				this.logger.error(`Failed to close hydraulic analysis: ${describeError(error)}`);
			}
		}
	}

	private finish(lifecycle: RunLifecycle): RunResult {
		const { failure, cycles } = lifecycle;
		if (failure) {
			this.logger.error(`❌ Simulation stopped after ${cycles} cycle(s) due to ${failure.kind} error: ${describeError(failure)}`);
			return { exitCode: ExitCode.FAILURE, interrupted: false, cycles, error: failure };
		}

		this.logger.log(`>--- Simulation stopped by user after ${cycles} cycle(s) ---`);
		return { exitCode: ExitCode.CLEAN, interrupted: true, cycles };
	}

	private async attempt(phase: string, action: () => Promise<void>): Promise<PhaseOutcome> {
		try {
			await action();
			return { ok: true };
		} catch (error) {
			if (isPlantError(error)) {
				return { ok: false, error };
			}
			return { ok: false, error: new SimulationError(`Unexpected failure during ${phase}`, { cause: error }) };
		}
	}

	private transition(next: OrchestratorState): void {
		const from = this.currentState;
		this.currentState = next;
		this.eventEmitter.emit('orchestrator.state', { from, to: next } satisfies StateChangedEvent);
	}
}
