// Public library surface.

export * from './version';
export * from './errors';
export * from './keys/primaryKey';
export * from './keys/writeKeysJson';
export * from './keys/deterministicJson';
export * from './archive/openArchive';
export * from './archive/memberSelector';
export * from './archive/scratchDir';
export * from './extract/declarationScanner';
export * from './extract/extractKeyDeclarations';
export * from './core/extractPrimaryKeysFromArchive';
export * from './report/extractionReport';
export * from './report/writeReport';
export * from './scan/inventory';
export * from './util/logger';
