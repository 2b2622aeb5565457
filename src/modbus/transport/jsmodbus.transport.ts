import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { once } from 'events';
import * as jsmodbus from 'jsmodbus';
import * as net from 'net';
import { plantConfig } from '../../config/plant.config';
import { ModbusTransport } from './modbus-transport.interface';

type ModbusTCPClient = InstanceType<typeof jsmodbus.client.TCP>;

/**
 * jsmodbus отклоняет запросы объектом UserRequestError, а не Error
 */
function toRequestError(reason: unknown): Error {
	if (reason instanceof Error) {
		return reason;
	}
	const message =
		typeof reason === 'object' && reason !== null && 'message' in reason && typeof reason.message === 'string'
			? reason.message
			: String(reason);
	return new Error(`Modbus request failed: ${message}`, { cause: reason });
}

/**
 * Modbus TCP клиент на jsmodbus поверх net.Socket
 * Одно постоянное соединение с ПЛК, без автоматического переподключения
 */
@Injectable()
export class JsModbusTransport implements ModbusTransport {
	private readonly logger = new Logger(JsModbusTransport.name);
	private socket?: net.Socket;
	private client?: ModbusTCPClient;

	constructor(
		@Inject(plantConfig.KEY)
		private readonly config: ConfigType<typeof plantConfig>,
	) {}

	async connect(host: string, port: number): Promise<void> {
		await this.close();

		const socket = new net.Socket();
		// Клиент создаётся до connect, чтобы увидеть событие 'connect' сокета
		const client = new jsmodbus.client.TCP(socket, this.config.modbus.unitId);

		await new Promise<void>((resolve, reject) => {
			const onError = (error: Error) => {
				socket.destroy();
				reject(error);
			};
			socket.once('error', onError);
			socket.connect({ host, port }, () => {
				socket.off('error', onError);
				resolve();
			});
		});

		socket.on('error', (error: Error) => {
			this.logger.warn(`Modbus socket error: ${error.message}`);
		});
		socket.on('close', () => {
			if (this.socket === socket) {
				this.logger.warn(`Modbus TCP connection to ${host}:${port} closed`);
				this.socket = undefined;
				this.client = undefined;
			}
		});

		this.socket = socket;
		this.client = client;
	}

	isOpen(): boolean {
		return this.socket !== undefined && !this.socket.destroyed;
	}

	async readCoils(address: number, count: number): Promise<boolean[]> {
		const { response } = await this.requireClient().readCoils(address, count).catch((reason: unknown) => {
			throw toRequestError(reason);
		});
		// jsmodbus отдаёт биты по целым байтам, лишние отрезаем
		const bits: ArrayLike<number | boolean> = response.body.valuesAsArray;
		return Array.from(bits, (bit) => Boolean(bit)).slice(0, count);
	}

	async readHoldingRegisters(address: number, count: number): Promise<number[]> {
		const { response } = await this.requireClient()
			.readHoldingRegisters(address, count)
			.catch((reason: unknown) => {
				throw toRequestError(reason);
			});
		const registers: ArrayLike<number> = response.body.valuesAsArray;
		return Array.from(registers);
	}

	async writeRegisters(address: number, values: number[]): Promise<void> {
		await this.requireClient()
			.writeMultipleRegisters(address, values)
			.catch((reason: unknown) => {
				throw toRequestError(reason);
			});
	}

	async close(): Promise<void> {
		const socket = this.socket;
		this.socket = undefined;
		this.client = undefined;

		if (!socket || socket.destroyed) {
			return;
		}

		const closed = once(socket, 'close');
		socket.destroy();
		await closed;
	}

	private requireClient(): ModbusTCPClient {
		if (!this.client || !this.isOpen()) {
			throw new Error('Modbus TCP transport is not connected');
		}
		return this.client;
	}
}
