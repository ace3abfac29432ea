export const DEFAULT_APPOINTMENT_TIME = '08:00';
export const DEFAULT_APPOINTMENT_OFFSET_DAYS = 3;

const pad = (value: number): string => String(value).padStart(2, '0');

/** MM/DD/YYYY in local time. */
export function formatDate(date: Date): string {
  return `${pad(date.getMonth() + 1)}/${pad(date.getDate())}/${date.getFullYear()}`;
}

/** MM/DD/YYYY HH:MM:SS in local time. */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Appointment timestamp for a lead. Without a date the appointment lands
 * three days out; without a time it defaults to 08:00.
 */
export function buildAppointment(now: Date, date?: string, time?: string): string {
  const day = date ?? formatDate(new Date(now.getFullYear(), now.getMonth(), now.getDate() + DEFAULT_APPOINTMENT_OFFSET_DAYS));
  return `${day} ${time ?? DEFAULT_APPOINTMENT_TIME}:00`;
}
