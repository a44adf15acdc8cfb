export { RawOpportunityBuilder, rawOpportunity } from './raw-opportunity.builder';
export { UserProfileBuilder, userProfile } from './user-profile.builder';
export { ApplicationRecordBuilder, applicationRecord } from './application-record.builder';
