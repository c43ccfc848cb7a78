export type Ms = number;        // milliseconds (durations, windows)
export type SessionMs = number; // ms timestamps as delivered by the pose stage
export type Confidence = number; // 0..1
