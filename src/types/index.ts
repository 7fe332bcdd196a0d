// src/types/index.ts

export * from './benchmark';
export * from './dataset';
