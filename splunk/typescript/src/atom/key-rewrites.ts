/**
 * Renames applied to the top-level keys of entry content before they are
 * split into paths
 *
 * Each rule maps a wire key to the key it is read under. Flags that share a
 * prefix with settings nest under `IsEnabled`; a few underscored alert keys
 * regroup under `alert`.
 */
export const DEFAULT_KEY_REWRITES: ReadonlyMap<string, string> = new Map([
  ['action.email', 'action.email.IsEnabled'],
  ['action.email.subject.alert', 'action.email.subject_alert'],
  ['action.email.subject.report', 'action.email.subject_report'],
  ['action.populate_lookup', 'action.populate_lookup.IsEnabled'],
  ['action.rss', 'action.rss.IsEnabled'],
  ['action.script', 'action.script.IsEnabled'],
  ['action.summary_index', 'action.summary_index.IsEnabled'],
  ['alert.suppress', 'alert.suppress.IsEnabled'],
  ['alert_comparator', 'alert.comparator'],
  ['alert_condition', 'alert.condition'],
  ['alert_threshold', 'alert.threshold'],
  ['alert_type', 'alert.type'],
  ['auto_summarize', 'auto_summarize.IsEnabled'],
  ['coldPath.maxDataSizeMB', 'coldPath_maxDataSizeMB'],
  ['display.visualizations.charting.chart', 'display.visualizations.charting.chart.Type'],
  ['homePath.maxDataSizeMB', 'homePath_maxDataSizeMB'],
  ['update.checksum.type', 'update.checksum_type'],
]);
