/**
 * Cascade engine exports
 */

export { destroyEntity, CascadeWalk } from './engine'
