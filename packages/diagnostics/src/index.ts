export {
  buildQualityReportFileName,
  DEFAULT_QUALITY_THRESHOLDS,
  QUALITY_CHECK_NAMES,
  resolveQualityRating,
  runDataQualityChecks,
  writeQualityReport,
  type DataQualityReport,
  type QualityCheckName,
  type QualityCheckResult,
  type QualityCheckStatus,
  type QualityRating,
  type QualityThresholds,
  type RunDataQualityChecksInput,
  type WriteQualityReportInput,
} from './data-quality-service.ts';

export {
  buildRawProfileFileName,
  profileRawSource,
  writeRawProfile,
  type ColumnProfile,
  type MonthlyVolumePattern,
  type ProfileRawSourceInput,
  type RawSourceOverview,
  type RawSourceProfile,
  type WriteRawProfileInput,
} from './raw-profile-service.ts';
