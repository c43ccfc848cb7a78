export { Mapper } from "./Mapper";
export { VibratoDetector } from "./VibratoDetector";
export {
  ZONE_CHORDS,
  MELODY_BASE,
  MELODY_STEPS,
  quantizeMelody,
  type ZoneChord,
} from "./harmony";
