export { handleConnect, displaySession } from "./connect.command";
export { handleStop } from "./stop.command";
export { handleClose } from "./close.command";
export { handleStatus, displayStatus } from "./status.command";
export { formatCommandError } from "./format-error";
export { withApplicationContext } from "./application-context";
