import { StoryPipeline } from "../pipeline.js";
import { createPipelineHandle } from "../pipelineHandle.js";

function makePipeline(): StoryPipeline {
  return new StoryPipeline({
    retriever: { retrieve: jest.fn().mockResolvedValue([]) },
    generator: { generate: jest.fn().mockResolvedValue("A story.") },
    k: 1
  });
}

describe("createPipelineHandle", () => {
  it("should build the pipeline once for concurrent first callers", async () => {
    const pipeline = makePipeline();
    const factory = jest.fn(async () => pipeline);
    const handle = createPipelineHandle(factory);

    const [a, b, c] = await Promise.all([handle.get(), handle.get(), handle.get()]);
    const d = await handle.get();

    expect(factory).toHaveBeenCalledTimes(1);
    expect(a).toBe(pipeline);
    expect(b).toBe(pipeline);
    expect(c).toBe(pipeline);
    expect(d).toBe(pipeline);
  });

  it("should not build anything until first use", () => {
    const factory = jest.fn(async () => makePipeline());
    createPipelineHandle(factory);

    expect(factory).not.toHaveBeenCalled();
  });

  it("should retry construction after a failure", async () => {
    const pipeline = makePipeline();
    const factory = jest
      .fn<Promise<StoryPipeline>, []>()
      .mockRejectedValueOnce(new Error("embedding service offline"))
      .mockResolvedValueOnce(pipeline);
    const handle = createPipelineHandle(factory);

    await expect(handle.get()).rejects.toThrow("embedding service offline");
    await expect(handle.get()).resolves.toBe(pipeline);
    expect(factory).toHaveBeenCalledTimes(2);
  });
});
