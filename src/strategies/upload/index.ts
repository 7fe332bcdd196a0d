// src/strategies/upload/index.ts

export * from './interfaces/IClientSelector';
export * from './interfaces/IUploadStrategy';

export * from './implement/ClientPoolUploadStrategy';
export * from './implement/ManagedTransferUploadStrategy';
export * from './implement/selector';
