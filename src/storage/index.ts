// src/storage/index.ts

export * from './interfaces/IObjectStorageClient';
export * from './interfaces/IStorageClientFactory';
export * from './interfaces/ITransferManager';
export * from './s3/S3ObjectStorageClient';
export * from './s3/S3StorageClientFactory';
export * from './s3/S3TransferManager';
