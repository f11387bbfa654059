export * from './object-from-bucket';
