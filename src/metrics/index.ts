export {
  MetricsRecorder,
  type MetricsSnapshot,
  type MetricsAlert,
  type LatencySummary,
} from './metrics-recorder.js';
