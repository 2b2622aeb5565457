import { LogLevel } from '@nestjs/common';
import { registerAs } from '@nestjs/config';
import { ConfigError } from '../common/errors';

export interface ModbusLinkConfig {
	host: string;
	port: number;
	unitId: number;
	reconnectIntervalMs: number; // пауза между попытками подключения
}

export interface SimulationConfig {
	hydraulicStepSeconds: number; // шаг гидравлического расчёта
	initialDurationSeconds: number; // начальная длительность, далее растёт на шаг каждый цикл
}

export interface CycleConfig {
	intervalMs: number; // пауза между циклами (не связана с шагом модели)
	statusEveryCycles: number;
}

export interface PlantConfig {
	modbus: ModbusLinkConfig;
	simulation: SimulationConfig;
	cycle: CycleConfig;
	logLevels: LogLevel[];
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose', 'fatal'];

function readInteger(name: string, fallback: number, min: number): number {
	const raw = process.env[name];
	if (raw === undefined || raw.trim() === '') {
		return fallback;
	}

	const value = Number(raw);
	if (!Number.isInteger(value) || value < min) {
		throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
	}
	return value;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevels(raw: string | undefined): LogLevel[] {
	if (raw === undefined || raw.trim() === '') {
		return ['error', 'warn', 'log'];
	}

	const levels: LogLevel[] = [];
	for (const item of raw.split(',')) {
		const level = item.trim();
		if (!isLogLevel(level)) {
			throw new ConfigError(`LOG_LEVELS contains unknown level "${level}"`);
		}
		levels.push(level);
	}
	return levels;
}

/**
 * Конфигурация процесса из переменных окружения (и .env)
 */
export const plantConfig = registerAs('plant', (): PlantConfig => ({
	modbus: {
		host: process.env.MODBUS_HOST || 'openplc',
		port: readInteger('MODBUS_PORT', 502, 1),
		unitId: readInteger('MODBUS_UNIT_ID', 1, 0),
		reconnectIntervalMs: readInteger('MODBUS_RECONNECT_INTERVAL_MS', 1000, 0),
	},
	simulation: {
		hydraulicStepSeconds: readInteger('HYDRAULIC_STEP_SECONDS', 1, 1),
		initialDurationSeconds: readInteger('INITIAL_DURATION_SECONDS', 10, 0),
	},
	cycle: {
		intervalMs: readInteger('CYCLE_INTERVAL_MS', 1000, 0),
		statusEveryCycles: readInteger('STATUS_LOG_EVERY_CYCLES', 10, 0),
	},
	logLevels: parseLogLevels(process.env.LOG_LEVELS),
}));
