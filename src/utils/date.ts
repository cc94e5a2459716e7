function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DD HH:mm:ss`, the meal log's timestamp format. */
export function formatTimestamp(d: Date = new Date()): string {
  const date = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
  return `${date} ${time}`;
}

/** Date portion of a log timestamp (everything before the first space). */
export function dayOfTimestamp(timestamp: string): string {
  return timestamp.trim().split(" ")[0];
}
