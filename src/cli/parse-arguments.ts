import { ConfigError } from '../common/errors';
import { getRegisterEntry } from '../modbus/config/register-map.config';

export const NETWORK_FILE_EXTENSION = '.inp';

/**
 * Текст справки, включая ограничения карты регистров на размер сети
 */
export function usage(program: string): string {
	const pipes = getRegisterEntry('pipe_status').slots;
	const pumps = Math.min(getRegisterEntry('pump_setting').slots, getRegisterEntry('pump_flow').slots);
	const junctions = getRegisterEntry('junction_pressure').slots;
	const tanks = getRegisterEntry('tank_head').slots;

	return [
		'Run EPANET simulation with Modbus controls.',
		`>>> ${program} [network${NETWORK_FILE_EXTENSION}]`,
		`Network limits: up to ${pipes} pipes, ${pumps} pumps, ${junctions} junctions and ${tanks} tanks.`,
	].join('\n');
}

/**
 * Единственный позиционный аргумент - путь к файлу сети EPANET
 * @param args - аргументы без node и имени скрипта
 * @throws ConfigError - аргументов не один или расширение не .inp
 */
export function parseArguments(args: readonly string[]): string {
	if (args.length !== 1) {
		throw new ConfigError(`Expected exactly one argument, got ${args.length}`);
	}

	const [networkFile] = args;
	if (!networkFile.endsWith(NETWORK_FILE_EXTENSION)) {
		throw new ConfigError(`Network file must have the ${NETWORK_FILE_EXTENSION} extension, got "${networkFile}"`);
	}
	return networkFile;
}
