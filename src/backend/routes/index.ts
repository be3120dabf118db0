// Route module exports
export { createBookRoutes } from './books';
export { createSessionRoutes, type SessionRoutesContext } from './sessions';
export { createStatsRoutes, type StatsRoutesContext } from './stats';
export { createGoalsRoutes, type GoalsRoutesContext } from './goals';
export { createSettingsRoutes, type SettingsRoutesContext } from './settings';
