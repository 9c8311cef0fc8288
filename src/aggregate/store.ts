export type DomainStats = {
  successCount: number;
  totalCount: number;
};

export type DomainAvailability = DomainStats & {
  domain: string;
};

/**
 * Cumulative per-domain probe counters for the life of the process.
 *
 * Buckets are created on first sight of a domain and never reset or removed.
 * Every method runs to completion without yielding, so concurrent probes on the
 * event loop cannot interleave inside an increment and a snapshot never sees a
 * half-applied one.
 */
export class AvailabilityStore {
  private readonly domains = new Map<string, DomainStats>();

  incrementTotal(domain: string): void {
    const stats = this.domains.get(domain);
    if (stats) {
      stats.totalCount += 1;
      return;
    }
    this.domains.set(domain, { successCount: 0, totalCount: 1 });
  }

  incrementSuccess(domain: string): void {
    const stats = this.domains.get(domain);
    if (!stats || stats.successCount >= stats.totalCount) {
      throw new Error(`success count would exceed total count for domain "${domain}"`);
    }
    stats.successCount += 1;
  }

  get(domain: string): DomainStats | null {
    const stats = this.domains.get(domain);
    return stats ? { ...stats } : null;
  }

  get size(): number {
    return this.domains.size;
  }

  /** Copies of every bucket, in the order domains were first seen. */
  snapshot(): DomainAvailability[] {
    const out: DomainAvailability[] = [];
    for (const [domain, stats] of this.domains) {
      out.push({ domain, successCount: stats.successCount, totalCount: stats.totalCount });
    }
    return out;
  }
}
