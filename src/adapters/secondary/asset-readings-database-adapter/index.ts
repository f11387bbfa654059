export * from './asset-readings-database-adapter';
