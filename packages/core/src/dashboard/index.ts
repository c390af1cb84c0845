export type {
  ChartPanel,
  ErrorResponse,
  ItineraryCharts,
  ItinerarySummary,
  LoginRequest,
  LoginResponse,
  PanelWarning,
  SessionInfo,
} from './api.js';
export { loginRequestSchema, weekdaySelectionSchema } from './api.js';
