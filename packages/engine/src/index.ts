export * from './config.js'
export * from './logger.js'
export * from './runtime/index.js'
export * from './game/GameState.js'
export * from './game/GameSession.js'
export * from './game/TickSource.js'
export * from './audio/NotePlayer.js'
export * from './loaders/NoteSheet.js'
export * from './loaders/SheetLoader.js'
export * from './loaders/SheetPackLoader.js'
