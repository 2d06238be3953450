export {
  createProbeApp,
  createMetricsApp,
  healthzHandler,
  readyzHandler,
  metricsHandler,
  listen,
  closeServer,
  type ProbeOptions,
  type TextHandler,
  type TextResponder,
} from './health-server.js';
