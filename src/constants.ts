export const SUM_READ_ROWS = 'sum_read_rows' as const;
export const SUM_READ_CASTS = 'sum_read_casts' as const;
export const SUM_SCAN_DIRECTORY = 'sum_scan_directory' as const;
export const SUM_DESCRIBE_LAYOUT = 'sum_describe_layout' as const;
export const SUM_LIST_ALIASES = 'sum_list_aliases' as const;

export type SumToolName =
  | typeof SUM_READ_ROWS
  | typeof SUM_READ_CASTS
  | typeof SUM_SCAN_DIRECTORY
  | typeof SUM_DESCRIBE_LAYOUT
  | typeof SUM_LIST_ALIASES;
