import { AlertsReport } from './alerts.js';
import { CatalogReport } from './catalog.js';
import { RemovedReport } from './removed.js';
import { TimelineReport } from './timeline.js';
import type { ReportContext, ReportRenderer } from './types.js';

export type { CycleReport, ReportContext, ReportRenderer } from './types.js';

export const createReportRenderers = (context: ReportContext): ReportRenderer[] => [
    new AlertsReport(context),
    new RemovedReport(context),
    new CatalogReport(context),
    new TimelineReport(context),
];
