import levenshtein from 'fast-levenshtein';

export const normalizeName = (name: string) =>
  name
    .toLowerCase()
    .replace(/[_\s-]/g, '')
    .trim();

export const nameSimilarity = (a: string, b: string) => {
  const na = normalizeName(a);
  const nb = normalizeName(b);
  if (!na || !nb) return 0;
  const dist = levenshtein.get(na, nb);
  const maxLen = Math.max(na.length, nb.length) || 1;
  return 1 - dist / maxLen;
};

/** Singular and plural spellings a table might use for an entity prefix. */
export const tableNameForms = (prefix: string) => {
  const p = prefix.toLowerCase();
  const forms = new Set([p, `${p}s`, `${p}es`]);
  if (p.endsWith('y')) forms.add(`${p.slice(0, -1)}ies`);
  return forms;
};

export const singularize = (value: string) => {
  const v = value.toLowerCase();
  if (v.endsWith('ies')) return `${v.slice(0, -3)}y`;
  if (v.endsWith('ses') || v.endsWith('xes')) return v.slice(0, -2);
  if (v.endsWith('s') && !v.endsWith('ss')) return v.slice(0, -1);
  return v;
};
