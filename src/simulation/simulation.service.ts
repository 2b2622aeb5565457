import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { readFile } from 'fs/promises';
import { ConfigError, describeError, SimulationError } from '../common/errors';
import { plantConfig } from '../config/plant.config';
import {
	HYDRAULIC_ENGINE_FACTORY,
	HydraulicEngine,
	HydraulicEngineFactory,
} from './engine/hydraulic-engine.interface';
import {
	AssetClass,
	AssetCounts,
	AssetIndex,
	NetworkSummary,
	SimulationLoadedEvent,
} from './interfaces/network.interface';

type EnginePhase = 'unloaded' | 'loaded' | 'running' | 'released';

interface LoadedNetwork {
	engine: HydraulicEngine;
	indices: Record<AssetClass, AssetIndex[]>;
	nodeCount: number;
	linkCount: number;
}

/**
 * Гидравлическая модель как контейнер состояния, адресуемый по индексам
 */
@Injectable()
export class SimulationService {
	private readonly logger = new Logger(SimulationService.name);
	private network?: LoadedNetwork;
	private phase: EnginePhase = 'unloaded';
	private stepsTaken = 0;

	constructor(
		@Inject(HYDRAULIC_ENGINE_FACTORY)
		private readonly engineFactory: HydraulicEngineFactory,
		@Inject(plantConfig.KEY)
		private readonly config: ConfigType<typeof plantConfig>,
		private readonly eventEmitter: EventEmitter2,
	) {}

	get isLoaded(): boolean {
		return this.network !== undefined;
	}

	get steps(): number {
		return this.stepsTaken;
	}

	/**
	 * Загрузить сеть из .inp файла
	 * @throws ConfigError - файл не читается или движок его не принимает
	 */
	async load(file: string): Promise<NetworkSummary> {
		if (this.network) {
			throw new SimulationError('A network is already loaded');
		}

		let contents: Buffer;
		try {
			contents = await readFile(file);
		} catch (error) {
			throw new ConfigError(`Cannot read network file ${file}`, { cause: error });
		}

		const { hydraulicStepSeconds, initialDurationSeconds } = this.config.simulation;
		let engine: HydraulicEngine;
		try {
			engine = this.engineFactory.open(file, contents);
		} catch (error) {
			throw new ConfigError(`Cannot load network file ${file}`, { cause: error });
		}

		let network: LoadedNetwork;
		try {
			engine.setDuration(initialDurationSeconds);
			engine.setHydraulicStep(hydraulicStepSeconds);
			network = this.enumerate(engine);
		} catch (error) {
			this.closeQuietly(engine);
			throw new ConfigError(`Cannot initialise network ${file}`, { cause: error });
		}

		this.network = network;
		this.phase = 'loaded';
		const summary: NetworkSummary = {
			file,
			counts: this.assetCounts(),
			hydraulicStepSeconds,
		};
		this.logger.log(`Network ${file} loaded: ${network.nodeCount} nodes, ${network.linkCount} links`);
		this.eventEmitter.emit('simulation.loaded', summary satisfies SimulationLoadedEvent);
		return summary;
	}

	/**
	 * Индексы объектов класса в порядке движка (задаёт порядок кадров)
	 */
	assetIndices(assetClass: AssetClass): readonly AssetIndex[] {
		return this.requireNetwork().indices[assetClass];
	}

	assetCounts(): AssetCounts {
		const { indices } = this.requireNetwork();
		return {
			junction: indices.junction.length,
			reservoir: indices.reservoir.length,
			tank: indices.tank.length,
			pipe: indices.pipe.length,
			pump: indices.pump.length,
			valve: indices.valve.length,
		};
	}

	setPipeStatus(index: AssetIndex, open: boolean): void {
		const network = this.requireNetwork();
		this.requireAsset(network, 'pipe', index);
		this.invoke(`set status of pipe ${index}`, () => network.engine.setLinkStatus(index, open));
	}

	setPumpSetting(index: AssetIndex, value: number): void {
		const network = this.requireNetwork();
		this.requireAsset(network, 'pump', index);
		if (!Number.isFinite(value) || value < 0) {
			throw new SimulationError(`Pump ${index} setting must be a finite value >= 0, got ${value}`);
		}
		this.invoke(`set setting of pump ${index}`, () => network.engine.setLinkSetting(index, value));
	}

	/**
	 * Открыть гидравлический расчёт для бесконечной последовательности шагов
	 */
	beginContinuousAnalysis(): void {
		const network = this.requireNetwork();
		if (this.phase === 'running') {
			return;
		}

		this.invoke('open hydraulic analysis', () => network.engine.openHydraulics());
		this.phase = 'running';
		this.stepsTaken = 0;
		this.logger.log('Continuous hydraulic analysis started');
	}

	/**
	 * Один гидравлический шаг. Длительность модели увеличивается на шаг перед расчётом,
	 * поэтому горизонт фактически не ограничен.
	 * @returns время модели после шага, с
	 */
	step(): number {
		const network = this.requireNetwork();
		if (this.phase !== 'running') {
			throw new SimulationError('Hydraulic analysis has not been started');
		}

		const { engine } = network;
		const stepSeconds = this.config.simulation.hydraulicStepSeconds;

		const clockSeconds = this.invoke('advance hydraulic step', () => {
			engine.setDuration(engine.getDuration() + stepSeconds);
			if (this.stepsTaken > 0) {
				engine.advanceHydraulics();
			}
			return engine.solveHydraulics();
		});

		this.stepsTaken++;
		return clockSeconds;
	}

	readPressure(index: AssetIndex): number {
		const network = this.requireSolved();
		this.requireRange(index, network.nodeCount, 'node');
		return this.invoke(`read pressure of node ${index}`, () => network.engine.nodePressure(index));
	}

	readHead(index: AssetIndex): number {
		const network = this.requireSolved();
		this.requireRange(index, network.nodeCount, 'node');
		return this.invoke(`read head of node ${index}`, () => network.engine.nodeHead(index));
	}

	readFlow(index: AssetIndex): number {
		const network = this.requireSolved();
		this.requireRange(index, network.linkCount, 'link');
		return this.invoke(`read flow of link ${index}`, () => network.engine.linkFlow(index));
	}

	/**
	 * Закрыть расчёт и освободить движок. Повторный вызов ничего не делает.
	 */
	endContinuousAnalysis(): void {
		const network = this.network;
		if (!network || this.phase === 'released') {
			return;
		}

		const wasRunning = this.phase === 'running';
		this.phase = 'released';
		this.network = undefined;

		try {
			if (wasRunning) {
				network.engine.closeHydraulics();
			}
		} finally {
			network.engine.close();
		}
		this.logger.log(`Hydraulic analysis closed after ${this.stepsTaken} step(s)`);
	}

	private enumerate(engine: HydraulicEngine): LoadedNetwork {
		const indices: Record<AssetClass, AssetIndex[]> = {
			junction: [],
			reservoir: [],
			tank: [],
			pipe: [],
			pump: [],
			valve: [],
		};

		const nodeCount = engine.nodeCount();
		for (let index = 1; index <= nodeCount; index++) {
			indices[engine.nodeKind(index)].push(index);
		}

		const linkCount = engine.linkCount();
		for (let index = 1; index <= linkCount; index++) {
			indices[engine.linkKind(index)].push(index);
		}

		return { engine, indices, nodeCount, linkCount };
	}

	private requireNetwork(): LoadedNetwork {
		if (!this.network) {
			throw new SimulationError('No network is loaded');
		}
		return this.network;
	}

	private requireSolved(): LoadedNetwork {
		const network = this.requireNetwork();
		if (this.phase !== 'running' || this.stepsTaken === 0) {
			throw new SimulationError('No hydraulic step has been computed yet');
		}
		return network;
	}

	private requireAsset(network: LoadedNetwork, assetClass: AssetClass, index: AssetIndex): void {
		if (!network.indices[assetClass].includes(index)) {
			throw new SimulationError(`Index ${index} is not a ${assetClass} of the loaded network`);
		}
	}

	private requireRange(index: AssetIndex, count: number, kind: 'node' | 'link'): void {
		if (!Number.isInteger(index) || index < 1 || index > count) {
			throw new SimulationError(`Index ${index} is not a ${kind} of the loaded network`);
		}
	}

	private invoke<T>(operation: string, action: () => T): T {
		try {
			return action();
		} catch (error) {
			throw new SimulationError(`Engine failed to ${operation}`, { cause: error });
		}
	}

	private closeQuietly(engine: HydraulicEngine): void {
		try {
			engine.close();
		} catch (error) {
			this.logger.warn(`Failed to release engine: ${describeError(error)}`);
		}
	}
}
