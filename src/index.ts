/**
 * Client for the legacy TV remote-control protocol (TCP port 55000).
 * @module samsung-iapp-remote
 */
export * from './protocol';
export * from './logger';
export * from './core/config';
export * from './core/network';
export * from './core/Transport';
export * from './core/Authenticator';
export * from './core/RemoteClient';
export * from './core/MessageIterator';
export * from './core/EventReceiver';
