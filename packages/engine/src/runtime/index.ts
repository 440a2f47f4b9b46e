/**
 * Runtime logic for tile scheduling and judgement
 */

export * from './LaneModel.js'
export * from './SpeedPolicy.js'
export * from './TileScheduler.js'
export * from './InputHandler.js'
export * from './Judge.js'
