export * from './market';
export * from './strategy';
