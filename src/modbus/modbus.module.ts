import { Module } from '@nestjs/common';
import { ModbusLinkService } from './modbus-link.service';
import { ModbusRegistersMapper } from './modbus-registers.mapper';
import { JsModbusTransport } from './transport/jsmodbus.transport';
import { MODBUS_TRANSPORT } from './transport/modbus-transport.interface';

/**
 * Modbus TCP модуль
 * Соединение с ПЛК и карта регистров обмена
 */
@Module({
	providers: [
		{ provide: MODBUS_TRANSPORT, useClass: JsModbusTransport },
		ModbusLinkService,
		ModbusRegistersMapper,
	],
	exports: [ModbusLinkService, ModbusRegistersMapper],
})
export class ModbusModule {}
