export { EchoPipeline } from './echo.pipeline';
export type { EchoPipelineOptions } from './echo.pipeline';
export { ForwardingPipeline, ForwardReplySchema } from './forwarding.pipeline';
export type { ForwardingPipelineOptions, ForwardReply } from './forwarding.pipeline';
