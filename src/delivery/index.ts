export { DeliveryScheduler, type DeliveryConfig, type DeliveryOutcome } from "./scheduler.js";
export { JmapChunkSender, type ChunkSender, type OutgoingChunk } from "./sender.js";
