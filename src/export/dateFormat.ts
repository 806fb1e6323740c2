// All export dates are rendered in UTC so the same record always produces the
// same text, whatever the host locale or zone.

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function clock12(date: Date): { hour: number; meridiem: "AM" | "PM" } {
  const hours = date.getUTCHours();
  return {
    hour: hours % 12 === 0 ? 12 : hours % 12,
    meridiem: hours < 12 ? "AM" : "PM",
  };
}

/** `10/19/26, 6:49 AM` */
export function formatShortDateTime(date: Date): string {
  const { hour, meridiem } = clock12(date);
  const year = pad2(date.getUTCFullYear() % 100);
  return `${date.getUTCMonth() + 1}/${date.getUTCDate()}/${year}, ${hour}:${pad2(date.getUTCMinutes())} ${meridiem}`;
}

/** `October 19, 2026 at 6:49:05 AM UTC` */
export function formatLongDateTime(date: Date): string {
  const { hour, meridiem } = clock12(date);
  const month = MONTH_NAMES[date.getUTCMonth()];
  const time = `${hour}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())} ${meridiem}`;
  return `${month} ${date.getUTCDate()}, ${date.getUTCFullYear()} at ${time} UTC`;
}

/** `2026-10-19 06:49:05 +0000` */
export function formatReportDateTime(date: Date): string {
  const day = `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
  const time = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
  return `${day} ${time} +0000`;
}
