export {
  RedisApplicationRepository,
  COMPARE_AND_SET_SCRIPT,
  ALL_APPLICATIONS_KEY,
  applicationKey,
  userApplicationsKey,
} from './redis-application-repository';
export {
  RedisOpportunityRepository,
  ALL_OPPORTUNITIES_KEY,
  OPPORTUNITY_FINGERPRINTS_KEY,
  opportunityKey,
} from './redis-opportunity-repository';
export { RedisContentStore, DRAFTS_KEY } from './redis-content-store';
export { RedisProfileStore, PROFILES_KEY } from './redis-profile-store';
export { StoredApplicationRecordSchema, StoredDraftSchema, StoredOpportunitySchema } from './record-schema';
