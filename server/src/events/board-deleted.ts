import { z } from "zod";
import { Topic } from "./topic.js";

export const BOARD_DELETED_TOPIC = "board-deleted";

export const BoardDeletedEventSchema = z.object({
  board_id: z.string().min(1),
});

export type BoardDeletedEvent = z.infer<typeof BoardDeletedEventSchema>;

export function createBoardDeletedTopic(): Topic<BoardDeletedEvent> {
  return new Topic(BOARD_DELETED_TOPIC, BoardDeletedEventSchema);
}
