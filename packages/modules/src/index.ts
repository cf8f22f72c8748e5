// Feature modules
export * from "./navigationConsole/NavigationConsole";
export * from "./obstacleNavigator/ObstacleNavigator";
export * from "./obstacleNavigator/obstacleGuidance";
export * from "./emergency/EmergencyPanel";
export * from "./emergency/emergencyActions";
export * from "./wheelchairMaps/WheelchairMaps";
export * from "./wheelchairMaps/RouteMap";
export * from "./wheelchairMaps/mapsApi";
export * from "./wheelchairMaps/mapGeometry";

// Shared browser services
export * from "./shared/voiceManager";
export * from "./shared/useNavigationSocket";
export * from "./shared/useCamera";
export * from "./shared/useWakeLock";
export * from "./shared/frameCapture";
export * from "./shared/geolocation";
export * from "./shared/haptics";
