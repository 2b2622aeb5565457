#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import * as path from 'path';
import { AppModule } from './app.module';
import { parseArguments, usage } from './cli/parse-arguments';
import { describeError } from './common/errors';
import { plantConfig } from './config/plant.config';
import { CycleOrchestratorService } from './orchestrator/cycle-orchestrator.service';
import { ExitCode } from './orchestrator/interfaces/orchestrator.interface';

async function bootstrap(): Promise<ExitCode> {
	const program = path.basename(process.argv[1] ?? 'plant-bridge');

	let networkFile: string;
	try {
		networkFile = parseArguments(process.argv.slice(2));
	} catch (error) {
		console.error(describeError(error));
		console.error(usage(program));
		return ExitCode.FAILURE;
	}

	const app = await NestFactory.createApplicationContext(AppModule, {
		logger: ['error', 'warn'],
		abortOnError: false,
	});
	const config = app.get<ConfigType<typeof plantConfig>>(plantConfig.KEY);
	app.useLogger(config.logLevels);

	const logger = new Logger('Bootstrap');
	logger.log(`Plant bridge starting with network ${networkFile}`);

	// Первый сигнал - штатная остановка между циклами, повторный - стандартное поведение Node
	const orchestrator = app.get(CycleOrchestratorService);
	const stop = () => orchestrator.requestStop();
	process.once('SIGINT', stop);
	process.once('SIGTERM', stop);

	try {
		const result = await orchestrator.run(networkFile);
		return result.exitCode;
	} finally {
		process.off('SIGINT', stop);
		process.off('SIGTERM', stop);
		await app.close();
	}
}

bootstrap()
	.then((exitCode) => process.exit(exitCode))
	.catch((err: unknown) => {
		console.error(`Failed to run plant bridge: ${describeError(err)}`);
		process.exit(ExitCode.FAILURE);
	});
