/**
 * Кодеки значений для регистров и битов Modbus
 */

export const UINT16_MAX = 0xFFFF;

/**
 * Проверить, что значение - корректный 16-битный регистр
 */
export function isUint16(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= UINT16_MAX;
}

/**
 * Инвертированный бит: на линии 1 = закрыто, в модели true = открыто
 * @param wireBit - значение coil, прочитанное с ПЛК
 * @returns логическое значение (true = открыто)
 */
export function decodeNegatedBit(wireBit: boolean): boolean {
	return !wireBit;
}

/**
 * Беззнаковый регистр с масштабом x100 (150 => 1.5)
 * @param raw - значение регистра (0-65535)
 */
export function decodeCentiUint16(raw: number): number {
	if (!isUint16(raw)) {
		throw new RangeError(`Register value must be an unsigned 16-bit integer, got ${raw}`);
	}
	return raw / 100.0;
}

/**
 * Преобразовать число в FLOAT32 (IEEE-754) на два регистра, старшее слово первым
 * @param value - значение
 * @returns [старший регистр, младший регистр]
 */
export function float32ToRegisters(value: number): [number, number] {
	const buffer = Buffer.alloc(4);
	buffer.writeFloatBE(value, 0);
	return [buffer.readUInt16BE(0), buffer.readUInt16BE(2)];
}

/**
 * Собрать FLOAT32 из двух регистров (старшее слово первым)
 */
export function registersToFloat32(high: number, low: number): number {
	if (!isUint16(high) || !isUint16(low)) {
		throw new RangeError(`Register pair must hold unsigned 16-bit integers, got [${high}, ${low}]`);
	}

	const buffer = Buffer.alloc(4);
	buffer.writeUInt16BE(high, 0);
	buffer.writeUInt16BE(low, 2);
	return buffer.readFloatBE(0);
}

/**
 * Упаковать массив значений в подряд идущие пары регистров
 */
export function encodeFloat32Block(values: readonly number[]): number[] {
	const registers: number[] = [];
	for (const value of values) {
		registers.push(...float32ToRegisters(value));
	}
	return registers;
}
