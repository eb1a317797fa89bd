
// Global constants for activity generation and cleanup

// The single file every synthetic commit appends to, relative to the repository root
export const ACTIVITY_LOG_FILE = 'activity.log';

export const ACTIVITY_COMMIT_MESSAGE = 'Activity log update';

export const ACTIVITY_LOG_LINE_PREFIX = 'Activity logged at';

// Work-hour window: commit times fall between 09:00:00 and 17:59:59
export const WORK_HOUR_START = 9;
export const WORK_HOUR_END = 17;

// Average calendar year, used to scale vacation weeks to the range length
export const DAYS_PER_YEAR = 365.25;

// Weekday-weight buckets deciding how many weekdays per week get commits
export const WEEKDAY_WEIGHT_LOW = 0.3;
export const WEEKDAY_WEIGHT_MEDIUM = 0.6;

// Quiet season around Christmas and New Year that vacation weeks avoid
export const HOLIDAY_SEASON_START_DAY = 20; // December
export const HOLIDAY_SEASON_END_DAY = 7; // January

// Optional per-repository settings file
export const SETTINGS_FILE = '.activity-backfill.json';
