import {
	HydraulicEngine,
	HydraulicEngineFactory,
	LinkKind,
	NodeKind,
} from '../../src/simulation/engine/hydraulic-engine.interface';

/**
 * Движок с предсказуемыми значениями:
 * давление узла i = 40 + i, напор узла i = 100 + i / 2, расход связи i = i - 0.5
 */
export class FakeHydraulicEngine implements HydraulicEngine {
	duration = 0;
	hydraulicStep = 0;
	time = 0;
	solves = 0;
	solveFailure?: Error;
	readonly statuses = new Map<number, boolean>();
	readonly settings = new Map<number, number>();

	constructor(
		private readonly nodes: NodeKind[],
		private readonly links: LinkKind[],
		readonly callLog: string[] = [],
	) {}

	nodeCount(): number {
		return this.nodes.length;
	}

	linkCount(): number {
		return this.links.length;
	}

	nodeKind(index: number): NodeKind {
		return this.nodes[index - 1];
	}

	linkKind(index: number): LinkKind {
		return this.links[index - 1];
	}

	getDuration(): number {
		return this.duration;
	}

	setDuration(seconds: number): void {
		this.duration = seconds;
	}

	setHydraulicStep(seconds: number): void {
		this.hydraulicStep = seconds;
	}

	setLinkStatus(index: number, open: boolean): void {
		this.callLog.push(`status:${index}:${open}`);
		this.statuses.set(index, open);
	}

	setLinkSetting(index: number, value: number): void {
		this.callLog.push(`setting:${index}:${value}`);
		this.settings.set(index, value);
	}

	nodePressure(index: number): number {
		this.callLog.push(`pressure:${index}`);
		return 40 + index;
	}

	nodeHead(index: number): number {
		this.callLog.push(`head:${index}`);
		return 100 + index / 2;
	}

	linkFlow(index: number): number {
		this.callLog.push(`flow:${index}`);
		return index - 0.5;
	}

	openHydraulics(): void {
		this.callLog.push('openH');
	}

	solveHydraulics(): number {
		this.callLog.push('solve');
		if (this.solveFailure) {
			throw this.solveFailure;
		}
		this.solves++;
		return this.time;
	}

	advanceHydraulics(): number {
		this.callLog.push('advance');
		this.time += this.hydraulicStep;
		return this.hydraulicStep;
	}

	closeHydraulics(): void {
		this.callLog.push('closeH');
	}

	close(): void {
		this.callLog.push('closeEngine');
	}
}

export class FakeEngineFactory implements HydraulicEngineFactory {
	readonly opened: string[] = [];

	constructor(private readonly engine: HydraulicEngine | Error) {}

	open(file: string): HydraulicEngine {
		if (this.engine instanceof Error) {
			throw this.engine;
		}
		this.opened.push(file);
		return this.engine;
	}
}

// Две трубы, насос, два узла, резервуар и бак
export function createSmallNetworkEngine(callLog: string[] = []): FakeHydraulicEngine {
	return new FakeHydraulicEngine(['junction', 'junction', 'reservoir', 'tank'], ['pipe', 'pipe', 'pump'], callLog);
}
