export { HierarchyBuilder, formatEmployeeId } from './hierarchy.js';
export type { Hierarchy, HierarchySlot, LevelCounts } from './hierarchy.js';
export { DemographicsGenerator } from './demographics.js';
export type { DemographicsInput } from './demographics.js';
export { CareerEventScheduler, sortEvents } from './career-events.js';
export { AssignmentTimelineSimulator } from './assignments.js';
export type { AssignmentTimeline } from './assignments.js';
export { CompensationTimelineSimulator, jobInForce, roundCurrency } from './compensation.js';
export { PerformanceReviewGenerator, RATING_DISTRIBUTION, RATING_LABELS } from './performance.js';
