// src/core/validation/index.ts

// Export the service implementation
export * from './batch-partitioner.service';

// Export interfaces and tokens
export * from './interfaces/services';

// Rule and classifier functions are usable without the container
export * from './field-rules';
export * from './record-classifier';
export * from './reference-places';
