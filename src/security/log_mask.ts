export const mask = (s: string, keep = 2) => (s.length > keep * 2 ? s.slice(0, keep) + '…' + s.slice(-keep) : '*'.repeat(s.length));

// every digit but the last four
export const maskPhone = (s: string | null) => {
  if (!s) return s;
  const total = (s.match(/\d/g) ?? []).length;
  let seen = 0;
  return s.replace(/\d/g, d => (++seen <= total - 4 ? '*' : d));
};

export const maskEmail = (s: string | null) => {
  if (!s) return s;
  const at = s.indexOf('@');
  return at > 0 ? mask(s.slice(0, at), 1) + s.slice(at) : mask(s);
};

export const maskMid = (s: string) => mask(s, 2);

const piiMaskEnabled = () => process.env.PII_MASK !== 'false';

export const maybeMask = (s: string | null, fn: (v: string | null) => string | null) => (piiMaskEnabled() ? fn(s) : s);

export const maybeMaskMids = (ids: string[], limit = 10) =>
  ids.slice(0, limit).map(id => (piiMaskEnabled() ? maskMid(id) : id));
