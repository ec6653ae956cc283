export {
  HEALTH_STATUSES,
  type HealthStatus,
  type ClassifiedStatus,
  type FailureStatus,
  isHealthStatus,
  isFailureStatus,
} from './healthStatus.js'
