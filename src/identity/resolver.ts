import { readBudgets } from '../config/budgets.js';
import { InvalidInputError } from '../errors.js';
import { emitIntegrity } from '../observability/events.js';
import { createLog } from '../observability/log.js';
import type { Profile, WatchlistIdentifier } from '../schemas.js';
import { maskEmail, maskPhone, maybeMask, maybeMaskMids } from '../security/log_mask.js';
import type { QueryLoader } from '../sources/template.js';
import type { QuerySource, Row } from '../sources/types.js';
import { batches, text } from '../sources/values.js';
import type { Decrypt } from './decrypt.js';

const log = createLog('identity');
const SOURCE = 'oracledb';
export const GENDER_DOMAIN = 'CUST_GNDR_CD';

export type ResolverOptions = {
  decrypt: Decrypt;
  batchSize?: number;
};

const blank = (s: string | null) => s === null || s.trim() === '';

export function composeAddress(base: string | null, detail: string | null): string | null {
  if (blank(detail)) return base;
  return base === null ? detail : `${base} ${detail}`;
}

/** Resolves watchlist identifiers to KYC profiles, one per customer. */
export class IdentityResolver {
  private readonly batchSize: number;
  private genders: Promise<Map<string, string>> | null = null;

  constructor(private readonly source: QuerySource, private readonly queries: QueryLoader, private readonly opts: ResolverOptions) {
    this.batchSize = opts.batchSize ?? readBudgets().QUERY_BATCH_SIZE;
  }

  private genderNames(): Promise<Map<string, string>> {
    if (!this.genders) {
      const loading = this.loadCodes(GENDER_DOMAIN);
      this.genders = loading;
      void loading.catch(() => { if (this.genders === loading) this.genders = null; });
    }
    return this.genders;
  }

  private async loadCodes(domain: string): Promise<Map<string, string>> {
    const sql = await this.queries.render(SOURCE, 'code_lookup', { code_domain: domain });
    const rows = await this.source.fetch(sql);
    const m = new Map<string, string>();
    for (const r of rows) {
      const code = text(r.code);
      const name = text(r.name);
      if (code !== null && name !== null) m.set(code.trim(), name);
    }
    return m;
  }

  private decrypt(v: string | null): string | null {
    return v === null ? null : this.opts.decrypt(v);
  }

  private toProfile(r: Row, genders: Map<string, string>): Profile {
    const customerId = text(r.customer_id) ?? '';
    const code = text(r.gender_code);
    let gender: string | null = null;
    if (code !== null) {
      gender = genders.get(code.trim()) ?? null;
      if (gender === null) {
        emitIntegrity({ kind: 'unknown_gender_code', message: 'gender code missing from code table', userId: customerId, count: 1 });
      }
    }
    return {
      customerId,
      displayName: text(r.display_name),
      gender,
      birthDate: text(r.birth_date),
      highNetWorth: text(r.high_net_worth),
      residentialAddress: composeAddress(text(r.residential_base), text(r.residential_detail)),
      workplaceName: text(r.workplace_name),
      workplaceAddress: composeAddress(text(r.workplace_base), text(r.workplace_detail)),
      phone: this.decrypt(text(r.phone_cipher)),
      email: this.decrypt(text(r.email_cipher)),
      kycCompletedAt: text(r.kyc_completed_at),
      memberId: text(r.membership_member_id) ?? text(r.kyc_member_id),
    };
  }

  async resolve(identifiers: readonly WatchlistIdentifier[]): Promise<Profile[]> {
    const ids = [...new Set(identifiers.map(s => s.trim()))];
    if (ids.length === 0 || ids.some(s => s === '')) {
      throw new InvalidInputError('identifiers must be a non-empty list of non-blank values');
    }
    const genders = await this.genderNames();

    const rows: Row[] = [];
    for (const chunk of batches(ids, this.batchSize)) {
      const sql = await this.queries.render(SOURCE, 'black_mid_customer_info', { mid_list: chunk });
      rows.push(...await this.source.fetch(sql));
    }

    const byCustomer = new Map<string, Profile>();
    for (const r of rows) {
      const id = text(r.customer_id) ?? '';
      if (!byCustomer.has(id)) byCustomer.set(id, this.toProfile(r, genders));
    }
    const profiles = [...byCustomer.values()].sort((a, b) => (a.customerId < b.customerId ? -1 : a.customerId > b.customerId ? 1 : 0));

    const covered = new Set<string>();
    for (const r of rows) {
      for (const k of [text(r.membership_member_id), text(r.kyc_member_id)]) if (k !== null) covered.add(k);
    }
    const unmatched = ids.filter(id => !covered.has(id));
    log.info('profiles resolved', { requested: ids.length, profiles: profiles.length, unmatched: unmatched.length });
    if (unmatched.length) log.debug('unmatched identifiers', { sample: maybeMaskMids(unmatched) });
    if (profiles.length) {
      const p = profiles[0];
      log.debug('first profile', { customerId: p.customerId, phone: maybeMask(p.phone, maskPhone), email: maybeMask(p.email, maskEmail) });
    }
    return profiles;
  }
}
