// Parameter stream
export * from "./osc";

// Note stream
export * from "./midi";

// Input conversion
export * from "./pose";
