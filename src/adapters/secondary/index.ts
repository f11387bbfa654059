export * from './asset-readings-database-adapter';
export * from './object-from-bucket';
