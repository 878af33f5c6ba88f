export * from './provider.error';
export * from './persistence.error';
export * from './refresh-in-progress.error';
