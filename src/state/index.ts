export { createPublishStateStore, getWatermark } from "./store";
export type { PublishState, PublishStateStore } from "./store";
