import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { delay } from '../common/delay';
import { describeError, LinkError } from '../common/errors';
import { plantConfig } from '../config/plant.config';
import {
	LinkConnectedEvent,
	LinkConnectFailedEvent,
	LinkDisconnectedEvent,
	LinkState,
} from './interfaces/modbus.interface';
import { MODBUS_TRANSPORT, ModbusTransport } from './transport/modbus-transport.interface';

/**
 * Соединение с ПЛК (Modbus TCP)
 *
 * connect() повторяет попытки бесконечно с фиксированной паузой.
 * Операции чтения/записи однократные: сбой превращается в LinkError,
 * соединение считается разорванным, переподключение только явным connect().
 */
@Injectable()
export class ModbusLinkService {
	private readonly logger = new Logger(ModbusLinkService.name);
	private linkState = LinkState.DISCONNECTED;

	constructor(
		@Inject(MODBUS_TRANSPORT)
		private readonly transport: ModbusTransport,
		@Inject(plantConfig.KEY)
		private readonly config: ConfigType<typeof plantConfig>,
		private readonly eventEmitter: EventEmitter2,
	) {}

	get state(): LinkState {
		return this.linkState;
	}

	/**
	 * Подключиться к ПЛК, повторяя попытки до успеха
	 * @param signal - отмена ожидания (остановка пользователем во время старта)
	 * @returns CONNECTED, либо DISCONNECTED если ожидание отменено
	 */
	async connect(host: string, port: number, signal?: AbortSignal): Promise<LinkState> {
		if (this.linkState === LinkState.CONNECTED) {
			return this.linkState;
		}

		const retryMs = this.config.modbus.reconnectIntervalMs;
		let attempt = 0;

		while (!signal?.aborted) {
			attempt++;
			try {
				await this.transport.connect(host, port);
				this.linkState = LinkState.CONNECTED;
				this.logger.log(`🔌 Connected to Modbus TCP endpoint ${host}:${port} (attempt ${attempt})`);
				this.eventEmitter.emit('link.connected', { host, port, attempts: attempt } satisfies LinkConnectedEvent);
				return this.linkState;
			} catch (error) {
				const reason = describeError(error);
				this.logger.warn(`Connection to ${host}:${port} failed (attempt ${attempt}): ${reason}. Retrying in ${retryMs} ms`);
				this.eventEmitter.emit('link.connect.failed', { host, port, attempt, error: reason } satisfies LinkConnectFailedEvent);
			}
			await delay(retryMs, signal);
		}

		this.logger.warn(`Connection to ${host}:${port} cancelled after ${attempt} attempt(s)`);
		return this.linkState;
	}

	async readCoils(address: number, count: number): Promise<boolean[]> {
		return this.perform(`read ${count} coils at ${address}`, () => this.transport.readCoils(address, count));
	}

	async readHoldingRegisters(address: number, count: number): Promise<number[]> {
		return this.perform(`read ${count} holding registers at ${address}`, () =>
			this.transport.readHoldingRegisters(address, count),
		);
	}

	async writeRegisters(address: number, values: number[]): Promise<void> {
		await this.perform(`write ${values.length} registers at ${address}`, () =>
			this.transport.writeRegisters(address, values),
		);
	}

	/**
	 * Закрыть соединение. Повторный вызов ничего не делает.
	 */
	async close(): Promise<void> {
		if (this.linkState === LinkState.DISCONNECTED && !this.transport.isOpen()) {
			return;
		}

		try {
			await this.transport.close();
		} finally {
			this.markDisconnected('closed');
		}
		this.logger.log('Modbus TCP connection closed');
	}

	private async perform<T>(operation: string, action: () => Promise<T>): Promise<T> {
		if (this.linkState !== LinkState.CONNECTED) {
			throw new LinkError(`Cannot ${operation}: link is not connected`);
		}

		try {
			return await action();
		} catch (error) {
			this.logger.error(`❌ Failed to ${operation}: ${describeError(error)}`);
			this.markDisconnected('io_error');
			throw new LinkError(`Failed to ${operation}`, { cause: error });
		}
	}

	private markDisconnected(reason: LinkDisconnectedEvent['reason']): void {
		if (this.linkState === LinkState.DISCONNECTED) {
			return;
		}
		this.linkState = LinkState.DISCONNECTED;
		this.eventEmitter.emit('link.disconnected', { reason } satisfies LinkDisconnectedEvent);
	}
}
