/**
 * backend/src/modules/reports/index.ts
 */

export { createReportModule, type ReportModule } from './report.module';
export type { DebtorMember, PaidGraphPoint, ReportPeriod } from './report.types';
