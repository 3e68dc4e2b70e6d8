export * from './appointment';
export * from './chart';
export * from './dashboard';
