export { ChartRequestServer, ServerState } from './chart-request-server'
export type { ChartRequestServerDependencies, ChartRequestServerEvents, RequestContext } from './chart-request-server'
