export * from './serialize';
export { FeedWriter, FEED_FILES } from './FeedWriter';
export { loadUniverseSnapshot, parseUniverseSnapshot, UniverseSnapshotSchema } from './SnapshotLoader';
