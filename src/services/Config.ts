import { Observable, of } from "rxjs";

import convict from "convict";

import yaml from "js-yaml";

import { url } from "convict-format-with-validator";
import DEBUG from "debug";
import {
  DEFAULT_UPDATE_INTERVAL_SECONDS,
  Installation,
  installationsSchema,
  parseInstallations,
  updateIntervalSchema,
} from "../evtracker/installation";

const debug = DEBUG("ev-tracker.config");

export const DEFAULT_API_BASE_URL = "https://api.evtracker.cz/api/v1";

convict.addParser({ extension: ["yml", "yaml"], parse: yaml.load });
convict.addFormat(url);
convict.addFormat({
  name: "update-interval",
  validate(value: unknown) {
    updateIntervalSchema.parse(value);
  },
  coerce: (value: string) => Number(value),
});
convict.addFormat({
  name: "installations",
  validate(value: unknown) {
    installationsSchema.parse(value);
  },
});

const CONVICT_SCHEMA = {
  host: {
    default: "http://homeassistant.local:8123",
    doc: "The host for your Home Assistant instance. Needs to include the port if it is not the default port.",
    env: "HASS_HOST",
    format: "url",
  },
  token: {
    default: "",
    doc: "A long-lived access token. Create one on your account profile. https://www.home-assistant.io/docs/authentication/#your-account-profile",
    env: "HASS_TOKEN",
    format: String,
    sensitive: true,
  },
  mqttDiscoveryPrefix: {
    default: "homeassistant",
    doc: "The MQTT discovery prefix Home Assistant listens on.",
    env: "HASS_MQTT_DISCOVERY_PREFIX",
    format: String,
  },
  idPrefix: {
    default: "ev_tracker",
    doc: "A prefix to put on the IDs. Maybe you want to have a secondary instance during development with different IDs so there is no overlap.",
    env: "HASS_ID_PREFIX",
    format: String,
  },
  mqttUrl: {
    default: "mqtt://mqtt.local",
    doc: "The URL to use for MQTT",
    env: "HASS_MQTT_URL",
    format: String,
  },
  evTracker: {
    apiKey: {
      default: "",
      doc: "API key for the EV Tracker cloud. Cars without their own key use this one.",
      env: "EV_TRACKER_API_KEY",
      format: String,
      sensitive: true,
    },
    baseUrl: {
      default: DEFAULT_API_BASE_URL,
      doc: "Base URL of the EV Tracker API.",
      env: "EV_TRACKER_BASE_URL",
      format: "url",
    },
    updateInterval: {
      default: DEFAULT_UPDATE_INTERVAL_SECONDS,
      doc: "Seconds between two polls of the statistics. Cars can override it.",
      env: "EV_TRACKER_UPDATE_INTERVAL",
      format: "update-interval",
    },
  },
  cars: {
    default: [],
    doc: "The cars to track, each with its own tariff and price settings.",
    format: "installations",
  },
};

export interface IRootConfig {
  host: string;
  token: string;
  idPrefix?: string;
  mqttDiscoveryPrefix: string;
  mqttUrl: string;
  objectId: string;
  evTracker: {
    baseUrl: string;
  };
  installations: Installation[];
}

export function loadRootConfig(path: string): IRootConfig {
  const config = convict(CONVICT_SCHEMA).loadFile(path);

  config.validate({ allowed: "strict" });

  const root: IRootConfig = {
    host: config.get("host"),
    token: config.get("token"),
    idPrefix: config.get("idPrefix"),
    mqttDiscoveryPrefix: config.get("mqttDiscoveryPrefix"),
    mqttUrl: config.get("mqttUrl"),
    objectId: "ev_tracker",
    evTracker: {
      baseUrl: config.get("evTracker.baseUrl"),
    },
    installations: parseInstallations(config.get("cars"), {
      apiKey: config.get("evTracker.apiKey"),
      updateInterval: config.get("evTracker.updateInterval"),
    }),
  };
  debug("root: %s", config.toString());

  return root;
}

export default class Config {
  private root?: IRootConfig;

  root$(): Observable<IRootConfig> {
    if (!this.root) {
      this.root = loadRootConfig(process.env.CONFIG_PATH || "./config.yaml");
    }

    return of(this.root);
  }
}
