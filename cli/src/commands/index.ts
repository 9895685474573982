export { startDaemonCommand } from "./daemon.js";
export { sendCommand, parseId } from "./control.js";
