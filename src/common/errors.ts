/**
 * Типизированные ошибки процесса
 *
 * ConfigError     - неверные аргументы, конфигурация или файл сети (фатально при старте)
 * LinkError       - сбой чтения/записи по Modbus (фатально для текущего запуска)
 * SimulationError - движок отклонил значение, не сошёлся или не инициализирован
 */
export type PlantErrorKind = 'config' | 'link' | 'simulation';

export abstract class PlantError extends Error {
	abstract readonly kind: PlantErrorKind;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class ConfigError extends PlantError {
	readonly kind = 'config';
}

export class LinkError extends PlantError {
	readonly kind = 'link';
}

export class SimulationError extends PlantError {
	readonly kind = 'simulation';
}

export function isPlantError(error: unknown): error is PlantError {
	return error instanceof PlantError;
}

/**
 * Текст ошибки для логов, включая первопричину
 */
export function describeError(error: unknown): string {
	if (!(error instanceof Error)) {
		if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
			return error.message;
		}
		return String(error);
	}
	if (error.cause !== undefined && error.cause !== error) {
		return `${error.message}: ${describeError(error.cause)}`;
	}
	return error.message;
}
