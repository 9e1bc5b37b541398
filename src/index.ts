export * from './types/board';
export * from './types/style';
export * from './types/input';

export * from './schema/errors';
export * from './schema/layoutCodec';
export * from './schema/styleCodec';

export * from './config/settings';
export * from './lib/logger';

export * from './engine/geometry';
export * from './engine/keycodes';
export * from './engine/styleLookup';
export * from './engine/textPolicy';
export * from './engine/inputTracker';
export * from './engine/mouseDynamics';
export * from './engine/hitTest';
export * from './engine/transform';
export * from './engine/editCommands';
export * from './engine/projector';

export * from './store/boardStore';
export * from './store/editStore';
