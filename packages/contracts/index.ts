export * from "./core/time";

// Input: pose landmarks (33-point body model)
export * from "./pose/landmarks";

// Per-frame kinematic features
export * from "./features/features";

// Outbound musical-control messages
export * from "./control/messages";

export * from "./pipeline/interfaces";

export * from "./diagnostics/diagnostics";
