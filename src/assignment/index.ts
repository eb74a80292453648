import { ReviewAssignmentEngine } from './engine.js'
import { createRandomSource, type RandomSource } from './random.js'
import type { ReviewStore } from '../storage/repository.js'

export interface AssignmentEngineOptions {
  store: ReviewStore
  random?: RandomSource
  seed?: number
}

export function createAssignmentEngine(options: AssignmentEngineOptions): ReviewAssignmentEngine {
  const random = options.random ?? createRandomSource(options.seed)
  return new ReviewAssignmentEngine(options.store, random)
}
