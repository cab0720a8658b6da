import type { StoryGenerator } from "./generator.js";

type CannedStory = {
  keywords: string[];
  story: string;
};

const CANNED_STORIES: CannedStory[] = [
  {
    keywords: ["kitsune", "fox"],
    story:
      "On the night of the harvest moon, the young fox Akiko woke to find a second tail curled beside the first. " +
      "She spent the winter learning to weave illusions from mist, and by spring she used them to lead a lost " +
      "woodcutter's child safely home through the cedar forest."
  },
  {
    keywords: ["wooden horse", "troy"],
    story:
      "After ten years outside the walls, the weary army built a horse of pale timber and sailed out of sight. " +
      "The Trojans dragged their prize inside and feasted, and while the city slept the hidden soldiers " +
      "climbed down and opened the gates."
  }
];

const DEFAULT_STORY =
  "With a torn map and a borrowed canoe, a river guide followed rumours of a golden city upstream. " +
  "The jungle tested her with flood and fever, and when she finally reached the ruined terraces she " +
  "found no gold, only the carved faces of the people who had told the story first.";

/** Offline generator that picks a fixed story by keywords in the prompt. */
export function createCannedStoryGenerator(): StoryGenerator {
  return {
    async generate(prompt: string): Promise<string> {
      const lower = prompt.toLowerCase();
      const match = CANNED_STORIES.find((s) => s.keywords.some((k) => lower.includes(k)));
      return match?.story ?? DEFAULT_STORY;
    }
  };
}
