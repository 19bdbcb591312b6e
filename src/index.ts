export { RemoteSession, RemoteSessionDependencies } from './core/RemoteSession.js';
export { SessionError, SessionErrorKind, isSessionError } from './core/SessionError.js';
export { LineEmitter, defaultPrinter } from './core/LineEmitter.js';
export { compareBootIdentities, isKnownBoot } from './core/BootIdentityTracker.js';
export { HealthProber, tcpProbe, icmpProbe } from './core/HealthProber.js';
export { ConfigManager, RemoteSessionConfig, getDefaultSettings } from './config/ConfigManager.js';
export {
  CommandChannel,
  CredentialLoader,
  PrivateKeyCredential,
  RemoteShellTransport,
  TransportConnectParams,
  TransportError,
  TransportHandle,
} from './transport/RemoteShellTransport.js';
export { Ssh2Transport } from './transport/Ssh2Transport.js';
export { KeyFileCredentialLoader } from './transport/KeyFileCredentialLoader.js';
export * from './types/index.js';
