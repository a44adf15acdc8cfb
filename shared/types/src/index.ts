export * from './opportunity';
export * from './scoring';
export * from './application';
export * from './submission';
export * from './tracking';
export * from './collaborators';
