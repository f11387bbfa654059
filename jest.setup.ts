process.env.TABLE_NAME = 'asset-readings-test-table';
process.env.LOG_LEVEL = 'SILENT';
process.env.POWERTOOLS_SERVICE_NAME = 'asset-readings-ingest-service';
process.env.POWERTOOLS_METRICS_NAMESPACE = 'AssetReadings';
process.env.POWERTOOLS_TRACE_ENABLED = 'false';
