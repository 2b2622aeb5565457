import { Injectable, Logger } from '@nestjs/common';
import { ConfigError, LinkError } from '../common/errors';
import { AssetCounts, ControlFrame, TelemetryFrame } from '../simulation/interfaces/network.interface';
import { getRegisterEntry, REGISTER_MAP } from './config/register-map.config';
import { RegisterMapEntry, RegisterWrite, TelemetryQuantity } from './interfaces/modbus.interface';
import { decodeCentiUint16, decodeNegatedBit, encodeFloat32Block } from './utils/register-codec.utils';

// Сырые блоки управления, прочитанные с ПЛК за один цикл
export interface ControlBlocks {
	coils: boolean[];
	holdingRegisters: number[];
}

export interface ReadRange {
	address: number;
	count: number;
}

// Какое количество объектов сети занимает каждый блок карты
const QUANTITY_ASSET: Record<RegisterMapEntry['quantity'], keyof AssetCounts> = {
	pipe_status: 'pipe',
	pump_setting: 'pump',
	junction_pressure: 'junction',
	tank_head: 'tank',
	pump_flow: 'pump',
};

/**
 * Маппер между кадрами модели и регистрами Modbus
 */
@Injectable()
export class ModbusRegistersMapper {
	private readonly logger = new Logger(ModbusRegistersMapper.name);
	private readonly pipeStatus = getRegisterEntry('pipe_status');
	private readonly pumpSetting = getRegisterEntry('pump_setting');

	/**
	 * Диапазоны чтения управления. Читаются целиком, независимо от размера сети.
	 */
	get coilRange(): ReadRange {
		return { address: this.pipeStatus.baseAddress, count: this.pipeStatus.slots };
	}

	get holdingRange(): ReadRange {
		return { address: this.pumpSetting.baseAddress, count: this.pumpSetting.slots };
	}

	/**
	 * Проверить, что сеть помещается в блоки карты регистров
	 * @throws ConfigError - если объектов больше, чем слотов
	 */
	assertNetworkFits(counts: AssetCounts): void {
		for (const entry of REGISTER_MAP) {
			const asset = QUANTITY_ASSET[entry.quantity];
			const count = counts[asset];
			if (count > entry.slots) {
				throw new ConfigError(
					`Network has ${count} ${asset} assets but register block "${entry.quantity}" holds at most ${entry.slots}`,
				);
			}
		}
		this.logger.debug(`Network fits register map: ${counts.pipe} pipes, ${counts.pump} pumps, ${counts.junction} junctions, ${counts.tank} tanks`);
	}

	/**
	 * Декодировать кадр управления. Лишние значения игнорируются, нехватка - ошибка.
	 */
	decodeControlFrame(blocks: ControlBlocks, pipeCount: number, pumpCount: number): ControlFrame {
		if (blocks.coils.length < pipeCount) {
			throw new LinkError(`Expected ${pipeCount} pipe status coils, controller returned ${blocks.coils.length}`);
		}
		if (blocks.holdingRegisters.length < pumpCount) {
			throw new LinkError(`Expected ${pumpCount} pump setting registers, controller returned ${blocks.holdingRegisters.length}`);
		}

		const pipeStatuses = blocks.coils.slice(0, pipeCount).map(decodeNegatedBit);

		let pumpSettings: number[];
		try {
			pumpSettings = blocks.holdingRegisters.slice(0, pumpCount).map(decodeCentiUint16);
		} catch (error) {
			throw new LinkError('Controller returned an invalid pump setting register', { cause: error });
		}

		return { pipeStatuses, pumpSettings };
	}

	/**
	 * Закодировать телеметрию в блоки записи (по одному на величину, пустые пропускаются)
	 */
	encodeTelemetryFrame(frame: TelemetryFrame): RegisterWrite[] {
		const blocks: Array<[TelemetryQuantity, number[]]> = [
			['junction_pressure', frame.junctionPressures],
			['tank_head', frame.tankHeads],
			['pump_flow', frame.pumpFlows],
		];

		const writes: RegisterWrite[] = [];
		for (const [quantity, values] of blocks) {
			if (values.length === 0) {
				continue;
			}

			const entry = getRegisterEntry(quantity);
			if (values.length > entry.slots) {
				throw new ConfigError(`Telemetry block "${quantity}" holds at most ${entry.slots} values, got ${values.length}`);
			}

			writes.push({
				quantity,
				address: entry.baseAddress,
				values: encodeFloat32Block(values),
			});
		}
		return writes;
	}
}
