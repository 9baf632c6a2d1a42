import type { ImageResolver } from '../images.js';
import type { DiffResult, History, Snapshot } from '../types.js';

export interface CycleReport {
    diff: DiffResult;
    snapshot: Snapshot;
    history: History;
    checkedAt: string; // ISO date
}

export interface ReportContext {
    outputDir: string;
    timeZone: string;
    images: ImageResolver;
}

export interface ReportRenderer {
    readonly name: string;
    render(report: CycleReport): Promise<void>;
}
