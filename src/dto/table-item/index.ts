export * from './table-item';
