import { EventEmitter2 } from '@nestjs/event-emitter';
import * as path from 'path';
import { ConfigError, SimulationError } from '../common/errors';
import {
	createSmallNetworkEngine,
	FakeEngineFactory,
	FakeHydraulicEngine,
} from '../../test/fakes/fake-hydraulic.engine';
import { createTestConfig } from '../../test/fakes/test-config';
import { SimulationLoadedEvent } from './interfaces/network.interface';
import { SimulationService } from './simulation.service';

const NETWORK_FILE = path.join(__dirname, '../../test/fixtures/small-network.inp');

describe('SimulationService', () => {
	let engine: FakeHydraulicEngine;
	let factory: FakeEngineFactory;
	let eventEmitter: EventEmitter2;
	let simulation: SimulationService;

	beforeEach(() => {
		engine = createSmallNetworkEngine();
		eventEmitter = new EventEmitter2();
		factory = new FakeEngineFactory(engine);
		simulation = new SimulationService(factory, createTestConfig(), eventEmitter);
	});

	describe('load', () => {
		it('groups engine indices by asset class', async () => {
			const loaded: SimulationLoadedEvent[] = [];
			eventEmitter.on('simulation.loaded', (event: SimulationLoadedEvent) => loaded.push(event));

			const summary = await simulation.load(NETWORK_FILE);

			expect(simulation.assetIndices('junction')).toEqual([1, 2]);
			expect(simulation.assetIndices('reservoir')).toEqual([3]);
			expect(simulation.assetIndices('tank')).toEqual([4]);
			expect(simulation.assetIndices('pipe')).toEqual([1, 2]);
			expect(simulation.assetIndices('pump')).toEqual([3]);
			expect(simulation.assetIndices('valve')).toEqual([]);
			expect(summary.counts).toEqual({ junction: 2, reservoir: 1, tank: 1, pipe: 2, pump: 1, valve: 0 });
			expect(loaded).toEqual([summary]);
			expect(factory.opened).toEqual([NETWORK_FILE]);
		});

		it('applies the configured step and initial duration', async () => {
			await simulation.load(NETWORK_FILE);
			expect(engine.hydraulicStep).toBe(1);
			expect(engine.duration).toBe(10);
		});

		it('reports a missing file as a configuration error', async () => {
			await expect(simulation.load(path.join(__dirname, 'missing.inp'))).rejects.toBeInstanceOf(ConfigError);
			expect(simulation.isLoaded).toBe(false);
		});

		it('reports a file the engine rejects as a configuration error', async () => {
			const rejecting = new SimulationService(
				new FakeEngineFactory(new Error('Error 200: one or more errors detected in input file')),
				createTestConfig(),
				eventEmitter,
			);
			await expect(rejecting.load(NETWORK_FILE)).rejects.toThrow(ConfigError);
		});

		it('loads only one network', async () => {
			await simulation.load(NETWORK_FILE);
			await expect(simulation.load(NETWORK_FILE)).rejects.toBeInstanceOf(SimulationError);
		});
	});

	describe('controls', () => {
		beforeEach(async () => {
			await simulation.load(NETWORK_FILE);
		});

		it('sets pipe status and pump setting by engine index', () => {
			simulation.setPipeStatus(2, false);
			simulation.setPumpSetting(3, 1.5);

			expect(engine.statuses.get(2)).toBe(false);
			expect(engine.settings.get(3)).toBe(1.5);
		});

		it('rejects indices of the wrong class', () => {
			expect(() => simulation.setPipeStatus(3, true)).toThrow(SimulationError);
			expect(() => simulation.setPumpSetting(1, 1)).toThrow('Index 1 is not a pump of the loaded network');
		});

		it('rejects negative or non-finite pump settings', () => {
			expect(() => simulation.setPumpSetting(3, -0.5)).toThrow(SimulationError);
			expect(() => simulation.setPumpSetting(3, Number.NaN)).toThrow(SimulationError);
			expect(engine.settings.size).toBe(0);
		});
	});

	describe('continuous analysis', () => {
		beforeEach(async () => {
			await simulation.load(NETWORK_FILE);
		});

		it('refuses to step before the analysis is open', () => {
			expect(() => simulation.step()).toThrow('Hydraulic analysis has not been started');
		});

		it('refuses to read results before the first step', () => {
			simulation.beginContinuousAnalysis();
			expect(() => simulation.readPressure(1)).toThrow(SimulationError);
		});

		it('extends the horizon and advances from the second step on', () => {
			simulation.beginContinuousAnalysis();

			expect(simulation.step()).toBe(0);
			expect(engine.duration).toBe(11);
			expect(simulation.step()).toBe(1);
			expect(engine.duration).toBe(12);

			expect(engine.callLog).toEqual(['openH', 'solve', 'advance', 'solve']);
			expect(simulation.steps).toBe(2);
		});

		it('opens the analysis only once', () => {
			simulation.beginContinuousAnalysis();
			simulation.beginContinuousAnalysis();
			expect(engine.callLog).toEqual(['openH']);
		});

		it('reads results of the last step', () => {
			simulation.beginContinuousAnalysis();
			simulation.step();

			expect(simulation.readPressure(1)).toBe(41);
			expect(simulation.readHead(4)).toBe(102);
			expect(simulation.readFlow(3)).toBe(2.5);
			expect(() => simulation.readPressure(5)).toThrow('Index 5 is not a node of the loaded network');
			expect(() => simulation.readFlow(0)).toThrow(SimulationError);
		});

		it('wraps engine failures', () => {
			const cause = new Error('Error 110: cannot solve network hydraulic equations');
			engine.solveFailure = cause;
			simulation.beginContinuousAnalysis();

			let failure: unknown;
			try {
				simulation.step();
			} catch (error) {
				failure = error;
			}

			expect(failure).toBeInstanceOf(SimulationError);
			expect(failure).toHaveProperty('cause', cause);
			expect(simulation.steps).toBe(0);
		});

		it('releases the engine exactly once', () => {
			simulation.beginContinuousAnalysis();
			simulation.step();

			simulation.endContinuousAnalysis();
			simulation.endContinuousAnalysis();

			expect(engine.callLog.filter((call) => call === 'closeH')).toHaveLength(1);
			expect(engine.callLog.filter((call) => call === 'closeEngine')).toHaveLength(1);
			expect(simulation.isLoaded).toBe(false);
			expect(() => simulation.step()).toThrow('No network is loaded');
		});

		it('skips closing hydraulics that were never opened', () => {
			simulation.endContinuousAnalysis();
			expect(engine.callLog).toEqual(['closeEngine']);
		});
	});
});
