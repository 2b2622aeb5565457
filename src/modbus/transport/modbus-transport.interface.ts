/**
 * Транспорт Modbus TCP: одно соединение, примитивы чтения/записи без повторов
 */
export interface ModbusTransport {
	connect(host: string, port: number): Promise<void>;
	isOpen(): boolean;
	readCoils(address: number, count: number): Promise<boolean[]>;
	readHoldingRegisters(address: number, count: number): Promise<number[]>;
	writeRegisters(address: number, values: number[]): Promise<void>;
	close(): Promise<void>;
}

export const MODBUS_TRANSPORT = Symbol('MODBUS_TRANSPORT');
