import type { RapiCommandDescriptor } from "../rapiCommand";
import { getEnergyLimitRapiCommand, setEnergyLimitRapiCommand } from "./energyLimit";
import {
  disableRapiCommand,
  enableRapiCommand,
  gfciSelfTestOffRapiCommand,
  gfciSelfTestOnRapiCommand,
  resetRapiCommand,
} from "./functions";
import { getCurrentCapacityRapiCommand } from "./getCurrentCapacity";
import { getCurrentVoltageRapiCommand } from "./getCurrentVoltage";
import { getEnergyRapiCommand } from "./getEnergy";
import { getFaultCountersRapiCommand } from "./getFaultCounters";
import { getSettingsRapiCommand } from "./getSettings";
import { getStateRapiCommand } from "./getState";
import { getTemperatureRapiCommand } from "./getTemperature";
import { getVersionRapiCommand } from "./getVersion";
import { setCurrentRapiCommand } from "./setCurrent";
import { setEchoRapiCommand } from "./setEcho";
import { setServiceLevelRapiCommand } from "./setServiceLevel";
import { getTimeLimitRapiCommand, setTimeLimitRapiCommand } from "./timeLimit";

export const RAPI_COMMANDS: readonly RapiCommandDescriptor[] = [
  getStateRapiCommand,
  getCurrentVoltageRapiCommand,
  getTemperatureRapiCommand,
  getVersionRapiCommand,
  getEnergyRapiCommand,
  getCurrentCapacityRapiCommand,
  getSettingsRapiCommand,
  getFaultCountersRapiCommand,
  getTimeLimitRapiCommand,
  getEnergyLimitRapiCommand,
  setCurrentRapiCommand,
  setServiceLevelRapiCommand,
  setEchoRapiCommand,
  setTimeLimitRapiCommand,
  setEnergyLimitRapiCommand,
  enableRapiCommand,
  disableRapiCommand,
  resetRapiCommand,
  gfciSelfTestOnRapiCommand,
  gfciSelfTestOffRapiCommand,
];
