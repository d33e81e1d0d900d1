export { type ProviderContext, type QueryHints, type RecordsToolOptions, defineRecordsTool, recordsQuery, facetQuery, recordsResponse, recordsUrl, toQuery } from './records.js';
export { sbbTools, railTrafficInfo, railwayLines, rollingStock, stationUsers, targetActualCompared, stationFurniture, stationServices, stationStores } from './datasets.js';
