/**
 * Типы гидравлической сети и кадров обмена
 */

export const ASSET_CLASSES = ['junction', 'reservoir', 'tank', 'pipe', 'pump', 'valve'] as const;

export type AssetClass = (typeof ASSET_CLASSES)[number];

// Индекс объекта, назначенный движком (для EPANET - с 1)
export type AssetIndex = number;

export type AssetCounts = Record<AssetClass, number>;

// Управление от ПЛК на один цикл
export interface ControlFrame {
	pipeStatuses: boolean[];   // true = открыта, порядок индексов труб
	pumpSettings: number[];    // относительная скорость, 1.0 = номинал
}

// Измерения модели после шага
export interface TelemetryFrame {
	junctionPressures: number[];
	tankHeads: number[];
	pumpFlows: number[];
}

export interface NetworkSummary {
	file: string;
	counts: AssetCounts;
	hydraulicStepSeconds: number;
}

export type SimulationLoadedEvent = NetworkSummary;
