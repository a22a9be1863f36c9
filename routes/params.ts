// Query-string helpers shared by the route files

/** Epoch milliseconds or anything Date.parse understands */
export function parseInstant(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const numeric = Number(raw);
  return Number.isFinite(numeric) ? numeric : Date.parse(raw);
}

/** An empty parameter counts as absent */
export function parseNumber(raw: string | undefined): number | undefined {
  return raw === undefined || raw === "" ? undefined : Number(raw);
}
