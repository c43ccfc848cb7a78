export type { OscTransport, OscMessage, OscArgument } from "./OscTransport";
export { OscParameterSink, type OscParameterSinkConfig } from "./OscParameterSink";
