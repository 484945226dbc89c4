// Chilean plates: 4-8 letters and digits once separators are gone (AB·CD·12, LXBW-68).
const PLATE_RE = /^[A-Z0-9]{4,8}$/;

export function normalizePlate(raw: string): string {
  return (raw || "").trim().toUpperCase().replace(/[-.·\s]/g, "");
}

export function isValidPlate(plate: string): boolean {
  return PLATE_RE.test(plate);
}
