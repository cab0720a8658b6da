import type { StoryPipeline } from "./pipeline.js";

export type PipelineHandle = {
  get(): Promise<StoryPipeline>;
};

/**
 * Lazily builds the pipeline on first use. Concurrent first callers share one
 * construction; a failed construction is forgotten so the next call retries.
 */
export function createPipelineHandle(factory: () => Promise<StoryPipeline>): PipelineHandle {
  let pending: Promise<StoryPipeline> | undefined;
  return {
    get(): Promise<StoryPipeline> {
      if (!pending) {
        pending = factory().catch((err: unknown) => {
          pending = undefined;
          throw err;
        });
      }
      return pending;
    }
  };
}
