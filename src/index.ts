export * from './schema/config.js';
export * from './schema/format.js';
export * from './schema/item.js';
export * from './schema/room.js';
export * from './schema/state.js';

export * from './engine/catalog.js';
export * from './engine/commands.js';
export * from './engine/exits.js';
export * from './engine/game.js';
export * from './engine/inventory.js';
export * from './engine/parser.js';
export * from './engine/player-state.js';
export * from './engine/room.js';
export * from './engine/story.js';
export * from './engine/world.js';

export * from './storage/config.js';
export * from './storage/errors.js';
export * from './storage/markdown-room.js';
export * from './storage/world-loader.js';

export * from './cli/presenter.js';
export * from './cli/repl.js';

export { createServer, startServer } from './server/index.js';
export type { AdventureSetup } from './server/adventure-tools.js';
