/**
 * Lifecycle hooks for entities
 *
 * Observers run sequentially in registration order and are awaited; an
 * observer that throws aborts the operation that dispatched it.
 */

import type { Entity } from './Entity'

export type LifecycleEvent = 'beforeSave' | 'afterSave' | 'beforeDestroy' | 'afterDestroy'

export type LifecycleObserver<E = Entity> = (entity: E) => void | Promise<void>

/**
 * Registry for lifecycle observers of one model
 */
export class HookRegistry {
  private observers = new Map<LifecycleEvent, LifecycleObserver[]>()

  /**
   * Register an observer
   * @returns Function to unregister the observer
   */
  on(event: LifecycleEvent, observer: LifecycleObserver): () => void {
    const list = this.observers.get(event) ?? []
    list.push(observer)
    this.observers.set(event, list)
    return () => {
      const current = this.observers.get(event)
      if (!current) return
      const index = current.indexOf(observer)
      if (index > -1) {
        current.splice(index, 1)
      }
    }
  }

  /**
   * Dispatch an event to every registered observer
   */
  async dispatch(event: LifecycleEvent, entity: Entity): Promise<void> {
    // Copy so observers can unregister themselves while running
    for (const observer of [...(this.observers.get(event) ?? [])]) {
      await observer(entity)
    }
  }
}
