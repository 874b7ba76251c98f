import { MessageCatalog } from "../engine/messages";

// Options shared by every engine-backed route plugin.
export type EngineRouteOptions = {
  messages: MessageCatalog;
  recommendationCount: number;
};
