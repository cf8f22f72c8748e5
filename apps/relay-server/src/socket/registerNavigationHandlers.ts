import {
  CONNECTED_MESSAGE,
  type ClientToServerEvents,
  STOPPED_MESSAGE,
  type ServerToClientEvents,
  cameraAnalysisSchema,
  describeIssues,
  startNavigationSchema,
  startedMessage
} from "@pathsense/nav-core";
import type { Server, Socket } from "socket.io";

import type { NavigationRelay } from "../relay/navigationRelay";

export type NavigationServer = Server<ClientToServerEvents, ServerToClientEvents>;
type NavigationSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

type Logger = Pick<Console, "info" | "warn">;

const reject = (socket: NavigationSocket, error: string, message: string, logger: Logger) => {
  logger.warn(`[Socket] ${socket.id} ${error}: ${message}`);
  socket.emit("navigation_error", { error, message });
};

export function registerNavigationHandlers(
  io: NavigationServer,
  relay: NavigationRelay,
  logger: Logger = console
): void {
  io.on("connection", (socket) => {
    logger.info(`[Socket] client connected ${socket.id}`);
    socket.emit("connected", { message: CONNECTED_MESSAGE });
    socket.emit("navigation_update", relay.snapshot());

    socket.on("start_navigation", (payload: unknown) => {
      const parsed = startNavigationSchema.safeParse(payload);
      if (!parsed.success) {
        reject(socket, "invalid_payload", describeIssues(parsed.error), logger);
        return;
      }
      const { mode } = parsed.data;
      relay.start(mode);
      socket.emit("navigation_started", { message: startedMessage(mode), mode });
    });

    socket.on("stop_navigation", () => {
      relay.stop();
      socket.emit("navigation_stopped", { message: STOPPED_MESSAGE });
    });

    socket.on("camera_analysis", (payload: unknown) => {
      const parsed = cameraAnalysisSchema.safeParse(payload);
      if (!parsed.success) {
        reject(socket, "invalid_payload", describeIssues(parsed.error), logger);
        return;
      }
      if (!relay.ingestCameraReading(parsed.data)) {
        reject(socket, "camera_mode_inactive", "Start camera navigation before sending readings", logger);
      }
    });

    socket.on("disconnect", (reason) => {
      logger.info(`[Socket] client disconnected ${socket.id} (${reason})`);
    });
  });
}
