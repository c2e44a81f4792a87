export * from './common';
export * from './emulator-backend';
export * from './state-supervisor';
