export { env, type FeedlineEnv } from './env.ts'
export {
  DatasetConfigContext,
  resolveDatasetConfig,
  type DatasetConfig,
} from './context.ts'
