export const STATION_ID = "1029TH";

export const STAGE_MEASURE = "1029TH-level-stage-i-15_min-mASD";
export const DOWNSTAGE_MEASURE = "1029TH-level-downstage-i-15_min-mASD";

const MEASURES_URL = "http://environment.data.gov.uk/flood-monitoring/id/measures";

export const SAMPLE_READINGS_RESPONSE = {
  items: [
    {
      "@id": "some/id/1",
      dateTime: "2024-03-15T10:00:00Z",
      measure: `${MEASURES_URL}/${STAGE_MEASURE}`,
      value: 1.234,
    },
    {
      "@id": "some/id/2",
      dateTime: "2024-03-15T10:15:00Z",
      measure: `${MEASURES_URL}/${DOWNSTAGE_MEASURE}`,
      value: 0.935,
    },
  ],
};

export const SAMPLE_STATION_IDS = "1029TH\nE2043\n52119\n";
