export { createLoggerPlugin, type LoggerPluginAPI, type LoggerPluginConfig } from './logger-plugin';
