export * from "./types/reading";

// Session
export * from "./session/config";
export * from "./session/types";
export * from "./session/navigationStateMachine";
export * from "./session/demoReading";

// Frame analysis
export * from "./cv/filters/types";
export * from "./cv/filters/ema";
export * from "./cv/filters/weightedMovingAverage";
export * from "./cv/frame/config";
export * from "./cv/frame/rgbaFrame";
export * from "./cv/frame/edges";
export * from "./cv/frame/texture";
export * from "./cv/frame/contrast";
export * from "./cv/frame/groundPlane";
export * from "./cv/frame/fusion";
export * from "./cv/frame/frameAnalyzer";

// Guidance
export * from "./guidance/alertZones";
export * from "./guidance/instructions";
export * from "./guidance/alertGate";

// Wire protocol
export * from "./protocol/schemas";
export * from "./protocol/events";

// Emergency
export * from "./emergency/types";
export * from "./emergency/emergencyStateMachine";
export * from "./emergency/share";
