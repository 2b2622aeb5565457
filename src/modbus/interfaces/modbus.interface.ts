/**
 * Интерфейсы и типы для Modbus TCP клиента (связь с ПЛК)
 */

// Области памяти Modbus, которые использует процесс
export enum ModbusAreaType {
	COILS = 'coils',                        // Read/Write биты (FC01, FC05, FC15)
	HOLDING_REGISTERS = 'holding_registers' // Read/Write 16-bit (FC03, FC06, FC16)
}

// Кодирование значения в области
export type RegisterCodec = 'negated_bit' | 'uint16_centi' | 'float32_pair';

// Величины, которыми обмениваются ПЛК и модель
export type ControlQuantity = 'pipe_status' | 'pump_setting';
export type TelemetryQuantity = 'junction_pressure' | 'tank_head' | 'pump_flow';
export type RegisterQuantity = ControlQuantity | TelemetryQuantity;

// Одна запись карты регистров
export interface RegisterMapEntry {
	quantity: RegisterQuantity;
	area: ModbusAreaType;
	baseAddress: number;       // Первый адрес блока (0-based)
	slots: number;             // Максимальное количество объектов в блоке
	stride: number;            // Количество адресов на один объект
	codec: RegisterCodec;
	access: 'R' | 'W';         // R - читаем с ПЛК, W - пишем в ПЛК
	description: string;
}

// Состояние соединения с ПЛК
export enum LinkState {
	DISCONNECTED = 'disconnected',
	CONNECTED = 'connected',
}

// Блок для записи одной командой FC16
export interface RegisterWrite {
	quantity: TelemetryQuantity;
	address: number;
	values: number[];
}

// События соединения
export interface LinkConnectedEvent {
	host: string;
	port: number;
	attempts: number;
}

export interface LinkConnectFailedEvent {
	host: string;
	port: number;
	attempt: number;
	error: string;
}

export interface LinkDisconnectedEvent {
	reason: 'closed' | 'io_error';
}
