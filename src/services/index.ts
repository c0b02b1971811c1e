export { ArchiveCodec, ZipArchiveCodec } from "./archiveCodec";
export { BotController, ChatContext, IncomingDocument, IncomingPhoto } from "./botController";
export { ConversionPipeline, PipelineHooks } from "./conversionPipeline";
export { ExpressService, HealthStatus, WEBHOOK_PATH } from "./expressService";
export { ImageCodec, SharpImageCodec } from "./imageCodec";
export { SessionStore } from "./sessionStore";
export { FileBasedStatisticsAggregator, StatisticsAggregator } from "./statisticsAggregator";
export { ChatTransport, TelegramClient } from "./telegramClient";
export { TempStorage } from "./tempStorage";
export { UpdatePoller } from "./updatePoller";
export { UpdateRouter } from "./updateRouter";
