import { createContainer, InjectionMode, asClass } from "awilix";

import Config from "./Config";
import Socket from "./Socket";
import States from "./States";
import Events from "./Events";
import StateStore from "./StateStore";
import Mqtt from "./Mqtt";
import HassStatus from "./HassStatus";
import BinarySensor from "./BinarySensor";
import Sensor from "./Sensor";
import Discovery from "./Discovery";

export interface IServicesCradle {
  config: Config;
  socket: Socket;
  states: States;
  events: Events;
  stateStore: StateStore;
  mqtt: Mqtt;
  discovery: Discovery;
  hassStatus: HassStatus;
  binarySensor: BinarySensor;
  sensor: Sensor;
}

// sets up awilix ... .
const container = createContainer<IServicesCradle>({
  injectionMode: InjectionMode.PROXY,
});

// just register the services.
container.register({
  config: asClass(Config, { lifetime: "SINGLETON" }),
  socket: asClass(Socket, { lifetime: "SINGLETON" }),
  states: asClass(States, { lifetime: "SINGLETON" }),
  events: asClass(Events, { lifetime: "SINGLETON" }),
  stateStore: asClass(StateStore, { lifetime: "SINGLETON" }),
  mqtt: asClass(Mqtt, { lifetime: "SINGLETON" }),
  discovery: asClass(Discovery, { lifetime: "SINGLETON" }),
  hassStatus: asClass(HassStatus, { lifetime: "SINGLETON" }),
  binarySensor: asClass(BinarySensor, { lifetime: "SINGLETON" }),
  sensor: asClass(Sensor, { lifetime: "SINGLETON" }),
});

export default container.cradle;
