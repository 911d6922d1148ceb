// CRM ids come in a case-sensitive 15-character form and an 18-character
// form that appends a checksum; both name the same record.
const SHORT = 15;
const LONG = 18;

export function sameRecordId(a: string | null | undefined, b: string | null | undefined): boolean {
  const x = (a ?? '').trim();
  const y = (b ?? '').trim();
  if (!x || !y) return false;
  if (x === y) return true;
  const comparable = (s: string) => s.length === SHORT || s.length === LONG;
  return comparable(x) && comparable(y) && x.slice(0, SHORT) === y.slice(0, SHORT);
}

/** A record rolls up to a shell when its parent id is set and is not itself. */
export function hasShell(record: { id: string; parentId?: string }): boolean {
  if (!record.parentId?.trim()) return false;
  return !sameRecordId(record.id, record.parentId);
}
