/**
 * Гидравлический движок, адресуемый по индексам узлов и связей
 */

export type NodeKind = 'junction' | 'reservoir' | 'tank';
export type LinkKind = 'pipe' | 'pump' | 'valve';

export interface HydraulicEngine {
	nodeCount(): number;
	linkCount(): number;
	nodeKind(index: number): NodeKind;
	linkKind(index: number): LinkKind;

	getDuration(): number;
	setDuration(seconds: number): void;
	setHydraulicStep(seconds: number): void;

	setLinkStatus(index: number, open: boolean): void;
	setLinkSetting(index: number, value: number): void;

	nodePressure(index: number): number;
	nodeHead(index: number): number;
	linkFlow(index: number): number;

	// Непрерывный гидравлический расчёт
	openHydraulics(): void;
	solveHydraulics(): number;   // текущее время модели, с
	advanceHydraulics(): number; // шаг до следующего момента, с (0 = конец)
	closeHydraulics(): void;

	close(): void;
}

/**
 * Открывает файл сети и возвращает готовый движок
 */
export interface HydraulicEngineFactory {
	open(file: string, contents: Buffer): HydraulicEngine;
}

export const HYDRAULIC_ENGINE_FACTORY = Symbol('HYDRAULIC_ENGINE_FACTORY');
