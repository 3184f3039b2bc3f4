/**
 * backend/src/modules/reports/report.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ReportErrors = {
  invalidPeriod(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid report period.', meta);
  },
} as const;
