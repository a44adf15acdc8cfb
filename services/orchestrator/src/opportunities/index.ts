export { OpportunityStore, opportunityIdFor } from './opportunity-store';
export type { OpportunityStoreConfig, OpportunityStoreDeps } from './opportunity-store';
export { InMemoryOpportunityRepository } from './opportunity-repository';
export type { OpportunityRepository } from './opportunity-repository';
export { canonicalizeUrl, computeFingerprint, descriptionShingle, normalizeText } from './fingerprint';
export type { FingerprintInput } from './fingerprint';
