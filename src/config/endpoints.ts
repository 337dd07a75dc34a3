import { EndpointDescriptor } from "../types";

const RCM_BASE_URL = "https://api.ipma.pt/open-data/forecast/meteorology/rcm";

function defineEndpoints(entries: EndpointDescriptor[]): readonly EndpointDescriptor[] {
  return Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
}

// Order matters: the collector processes and reports endpoints in this order.
export const FORECAST_ENDPOINTS: readonly EndpointDescriptor[] = defineEndpoints([
  {
    id: "d0",
    url: `${RCM_BASE_URL}/rcm-d0.json`,
    fileName: "rcm-d0.json",
    description: "Weather forecast for the current day",
  },
  {
    id: "d1",
    url: `${RCM_BASE_URL}/rcm-d1.json`,
    fileName: "rcm-d1.json",
    description: "Weather forecast for the following day",
  },
]);
