import { ConfigError, describeError, isPlantError, LinkError, SimulationError } from './errors';

describe('errors', () => {
	it('tags each error with its kind and class name', () => {
		const errors = [new ConfigError('bad port'), new LinkError('no reply'), new SimulationError('diverged')];

		expect(errors.map((error) => error.kind)).toEqual(['config', 'link', 'simulation']);
		expect(errors.map((error) => error.name)).toEqual(['ConfigError', 'LinkError', 'SimulationError']);
		expect(errors.every(isPlantError)).toBe(true);
		expect(isPlantError(new Error('plain'))).toBe(false);
	});

	it('describes the cause chain', () => {
		const error = new LinkError('Failed to read 100 coils at 0', { cause: new Error('socket hang up') });

		expect(describeError(error)).toBe('Failed to read 100 coils at 0: socket hang up');
		expect(describeError('timeout')).toBe('timeout');
	});

	it('reads the message of rejections that are not Error instances', () => {
		const cause = { err: 'Offline', message: 'no connection to modbus server' };
		const error = new LinkError('Failed to read 100 coils at 0', { cause });

		expect(describeError(cause)).toBe('no connection to modbus server');
		expect(describeError(error)).toBe('Failed to read 100 coils at 0: no connection to modbus server');
		expect(describeError({ code: 5 })).toBe('[object Object]');
	});
});
