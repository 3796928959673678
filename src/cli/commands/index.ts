export * from './wallet';
export * from './positions';
export * from './open';
export * from './close';
export * from './increase';
export * from './price';
