export * from './decode-utf8';
export * from './parse-csv-rows';
