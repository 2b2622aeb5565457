import { once } from 'events';
import * as jsmodbus from 'jsmodbus';
import * as net from 'net';
import { createTestConfig } from '../../../test/fakes/test-config';
import { describeError } from '../../common/errors';
import { JsModbusTransport } from './jsmodbus.transport';

const LOCALHOST = '127.0.0.1';

async function listen(server: net.Server): Promise<number> {
	server.listen(0, LOCALHOST);
	await once(server, 'listening');
	const address = server.address();
	if (address === null || typeof address === 'string') {
		throw new Error('Server is not bound to a TCP port');
	}
	return address.port;
}

describe('JsModbusTransport', () => {
	let netServer: net.Server;
	let port: number;
	let coils: Buffer;
	let holding: Buffer;
	let transport: JsModbusTransport;

	beforeEach(async () => {
		coils = Buffer.alloc(8192);
		holding = Buffer.alloc(8192 * 2);
		netServer = net.createServer();
		new jsmodbus.server.TCP(netServer, { coils, holding });
		port = await listen(netServer);
		transport = new JsModbusTransport(createTestConfig());
	});

	afterEach(async () => {
		await transport.close();
		const closed = once(netServer, 'close');
		netServer.close();
		await closed;
	});

	it('reads coils trimmed to the requested count', async () => {
		coils[0] = 0xff;
		await transport.connect(LOCALHOST, port);

		expect(await transport.readCoils(0, 10)).toEqual([true, true, true, true, true, true, true, true, false, false]);
	});

	it('reads holding registers as unsigned words', async () => {
		holding.writeUInt16BE(150, 0);
		holding.writeUInt16BE(50, 2);
		await transport.connect(LOCALHOST, port);

		expect(await transport.readHoldingRegisters(0, 3)).toEqual([150, 50, 0]);
	});

	it('writes a block of registers', async () => {
		await transport.connect(LOCALHOST, port);
		await expect(transport.writeRegisters(100, [0x4224, 0x0000])).resolves.toBeUndefined();
	});

	it('reports open and closed state', async () => {
		expect(transport.isOpen()).toBe(false);
		await transport.connect(LOCALHOST, port);
		expect(transport.isOpen()).toBe(true);

		await transport.close();
		expect(transport.isOpen()).toBe(false);
		await expect(transport.readCoils(0, 1)).rejects.toThrow('Modbus TCP transport is not connected');
	});

	it('rejects with a readable error when the server drops the connection mid-request', async () => {
		const dropping = net.createServer((socket) => {
			socket.once('data', () => socket.destroy());
		});
		const droppingPort = await listen(dropping);

		try {
			await transport.connect(LOCALHOST, droppingPort);
			const failure = await transport.readCoils(0, 100).catch((error: unknown) => error);

			expect(failure).toBeInstanceOf(Error);
			expect(describeError(failure)).toMatch(/^Modbus request failed: \S/);
			expect(describeError(failure)).not.toContain('[object Object]');
		} finally {
			await transport.close();
			const droppingClosed = once(dropping, 'close');
			dropping.close();
			await droppingClosed;
		}
	}, 10000);

	it('rejects when nothing listens on the port', async () => {
		const probe = net.createServer();
		const freePort = await listen(probe);
		const probeClosed = once(probe, 'close');
		probe.close();
		await probeClosed;

		await expect(transport.connect(LOCALHOST, freePort)).rejects.toThrow('ECONNREFUSED');
		expect(transport.isOpen()).toBe(false);
	});
});
