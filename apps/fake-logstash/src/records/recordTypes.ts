/**
 * One decoded json_lines frame. By convention carries `level` and `message`,
 * plus whatever else the sending log handler adds (`@timestamp`, `logger_name`, ...).
 */
export type LogRecord = Record<string, unknown>;

export type RecordQuery = {
  threshold?: string | number;
  search?: string;
  page: number;
  pageSize: number;
};

export type RecordPage = {
  items: LogRecord[];
  total: number;
};
