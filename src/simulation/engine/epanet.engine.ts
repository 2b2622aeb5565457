import { Injectable } from '@nestjs/common';
import {
	CountType,
	InitHydOption,
	LinkProperty,
	LinkType,
	NodeProperty,
	NodeType,
	Project,
	TimeParameter,
	Workspace,
} from 'epanet-js';
import * as path from 'path';
import { HydraulicEngine, HydraulicEngineFactory, LinkKind, NodeKind } from './hydraulic-engine.interface';

const LINK_STATUS_CLOSED = 0;
const LINK_STATUS_OPEN = 1;

/**
 * EPANET 2.2 (epanet-js, WebAssembly) как гидравлический движок
 */
export class EpanetEngine implements HydraulicEngine {
	constructor(private readonly project: Project) {}

	nodeCount(): number {
		return this.project.getCount(CountType.NodeCount);
	}

	linkCount(): number {
		return this.project.getCount(CountType.LinkCount);
	}

	nodeKind(index: number): NodeKind {
		switch (this.project.getNodeType(index)) {
			case NodeType.Reservoir:
				return 'reservoir';
			case NodeType.Tank:
				return 'tank';
			default:
				return 'junction';
		}
	}

	linkKind(index: number): LinkKind {
		switch (this.project.getLinkType(index)) {
			case LinkType.Pipe:
			case LinkType.CVPipe:
				return 'pipe';
			case LinkType.Pump:
				return 'pump';
			default:
				return 'valve';
		}
	}

	getDuration(): number {
		return this.project.getTimeParameter(TimeParameter.Duration);
	}

	setDuration(seconds: number): void {
		this.project.setTimeParameter(TimeParameter.Duration, seconds);
	}

	setHydraulicStep(seconds: number): void {
		this.project.setTimeParameter(TimeParameter.HydStep, seconds);
	}

	setLinkStatus(index: number, open: boolean): void {
		this.project.setLinkValue(index, LinkProperty.Status, open ? LINK_STATUS_OPEN : LINK_STATUS_CLOSED);
	}

	setLinkSetting(index: number, value: number): void {
		this.project.setLinkValue(index, LinkProperty.Setting, value);
	}

	nodePressure(index: number): number {
		return this.project.getNodeValue(index, NodeProperty.Pressure);
	}

	nodeHead(index: number): number {
		return this.project.getNodeValue(index, NodeProperty.Head);
	}

	linkFlow(index: number): number {
		return this.project.getLinkValue(index, LinkProperty.Flow);
	}

	openHydraulics(): void {
		this.project.openH();
		this.project.initH(InitHydOption.NoSave);
	}

	solveHydraulics(): number {
		return this.project.runH();
	}

	advanceHydraulics(): number {
		return this.project.nextH();
	}

	closeHydraulics(): void {
		this.project.closeH();
	}

	close(): void {
		this.project.close();
	}
}

@Injectable()
export class EpanetEngineFactory implements HydraulicEngineFactory {
	/**
	 * Файл копируется в виртуальную ФС WebAssembly модуля и открывается там
	 */
	open(file: string, contents: Buffer): HydraulicEngine {
		const workspace = new Workspace();
		const project = new Project(workspace);
		const name = path.basename(file);
		const stem = path.parse(name).name;

		workspace.writeFile(name, contents);
		project.open(name, `${stem}.rpt`, `${stem}.out`);
		return new EpanetEngine(project);
	}
}
