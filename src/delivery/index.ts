export { createTelegramPoster } from "./telegram";
export type {
  TelegramPoster,
  TelegramPosterOptions,
  DeliveryResult,
  ChannelFailure,
} from "./telegram";
