export type { MidiOutput } from "./MidiOutput";
export { MpeNoteSink, CC, type MpeNoteSinkConfig } from "./MpeNoteSink";
