import {
	ModbusAreaType,
	RegisterMapEntry,
	RegisterQuantity,
} from '../interfaces/modbus.interface';

/**
 * Карта регистров обмена с ПЛК
 * Раскладка фиксирована и должна совпадать с программой ПЛК бит в бит.
 * Блоки рассчитаны на максимальное число объектов, а не на размер конкретной сети.
 */
export const REGISTER_MAP: readonly RegisterMapEntry[] = [
	// ========== COILS (Read) - Статусы труб ==========
	{
		quantity: 'pipe_status',
		area: ModbusAreaType.COILS,
		baseAddress: 0,
		slots: 100,
		stride: 1,
		codec: 'negated_bit',
		access: 'R',
		description: 'Статус трубы (1 = закрыта, 0 = открыта)',
	},

	// ========== HOLDING REGISTERS (Read) - Уставки насосов ==========
	{
		quantity: 'pump_setting',
		area: ModbusAreaType.HOLDING_REGISTERS,
		baseAddress: 0,
		slots: 100,
		stride: 1,
		codec: 'uint16_centi',
		access: 'R',
		description: 'Относительная скорость насоса (x100, 100 = номинал)',
	},

	// ========== HOLDING REGISTERS (Write) - Телеметрия, FLOAT32 на 2 регистра ==========
	// Шаг базовых адресов 100 регистров => не более 50 пар на блок
	{
		quantity: 'junction_pressure',
		area: ModbusAreaType.HOLDING_REGISTERS,
		baseAddress: 100,
		slots: 50,
		stride: 2,
		codec: 'float32_pair',
		access: 'W',
		description: 'Давление в узле',
	},
	{
		quantity: 'tank_head',
		area: ModbusAreaType.HOLDING_REGISTERS,
		baseAddress: 200,
		slots: 50,
		stride: 2,
		codec: 'float32_pair',
		access: 'W',
		description: 'Напор в резервуаре',
	},
	{
		quantity: 'pump_flow',
		area: ModbusAreaType.HOLDING_REGISTERS,
		baseAddress: 300,
		slots: 50,
		stride: 2,
		codec: 'float32_pair',
		access: 'W',
		description: 'Расход через насос',
	},
];

export function getRegisterEntry(quantity: RegisterQuantity): RegisterMapEntry {
	const entry = REGISTER_MAP.find((item) => item.quantity === quantity);
	if (!entry) {
		throw new Error(`Register map has no entry for ${quantity}`);
	}
	return entry;
}

/**
 * Последний адрес блока (не включительно)
 */
export function registerBlockEnd(entry: RegisterMapEntry): number {
	return entry.baseAddress + entry.slots * entry.stride;
}
