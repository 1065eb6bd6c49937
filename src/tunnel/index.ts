/**
 * Tunnel service exports
 * Secure tunnel discovery/reuse, session orchestration and command handlers
 */

export {
  SecureTunnelService,
  SecureTunnelError,
  type SecureTunnelErrorCode,
  type SourceAccess,
} from "./secure-tunnel.service";

export {
  TunnelSessionService,
  type TunnelSession,
  type TunnelCloseResult,
  type TunnelStatusReport,
} from "./tunnel-session.service";

// Command handlers
export {
  handleConnect,
  handleStop,
  handleClose,
  handleStatus,
} from "./commands";
