import { PlantError } from '../../common/errors';
import { ControlFrame, TelemetryFrame } from '../../simulation/interfaces/network.interface';

export enum OrchestratorState {
	IDLE = 'idle',
	STARTING = 'starting',
	RUNNING = 'running',
	DRAINING = 'draining',
	STOPPED = 'stopped',
}

export enum ExitCode {
	CLEAN = 0,   // остановлено пользователем
	FAILURE = 1, // любая фатальная ошибка
}

/**
 * Состояние одного запуска. Владелец - оркестратор, передаётся в фазы Starting/Draining.
 */
export interface RunLifecycle {
	networkFile: string;
	linkOpened: boolean;
	networkLoaded: boolean;
	analysisStarted: boolean;
	cycles: number;
	failure?: PlantError;
}

export type PhaseOutcome = { ok: true } | { ok: false; error: PlantError };

export interface RunResult {
	exitCode: ExitCode;
	interrupted: boolean;
	cycles: number;
	error?: PlantError;
}

// События оркестратора
export interface StateChangedEvent {
	from: OrchestratorState;
	to: OrchestratorState;
}

export interface CycleCompletedEvent {
	cycle: number;
	simulatedSeconds: number;
	controls: ControlFrame;
	telemetry: TelemetryFrame;
}
