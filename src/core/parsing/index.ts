// src/core/parsing/index.ts

// Export the service implementation
export * from './file-parser.service';

// Export interfaces
export * from './interfaces/services';
