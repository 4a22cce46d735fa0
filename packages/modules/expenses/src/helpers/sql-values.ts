/** Raw `execute` results carry Postgres timestamp text; views expose ISO strings. */
export function toIso(value: string | Date): string {
  return new Date(value).toISOString();
}

export function toIsoOrNull(value: string | Date | null): string | null {
  return value === null ? null : toIso(value);
}
