/**
 * System capabilities: current date and time.
 */

import { Type } from "@sinclair/typebox";
import type { Capability } from "../core/registry.js";

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local calendar date as YYYY-MM-DD.
 */
export function localDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Local wall-clock time as HH:MM:SS.
 */
export function localTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export interface CurrentTime {
  datetime: string;
  date: string;
  time: string;
  day: string;
  timestamp: number;
}

export function describeTime(now: Date): CurrentTime {
  return {
    datetime: now.toISOString(),
    date: localDate(now),
    time: localTime(now),
    day: WEEKDAYS[now.getDay()],
    timestamp: Math.floor(now.getTime() / 1000),
  };
}

const GetTimeParams = Type.Object({});

export function createTimeCapability(now: () => Date = () => new Date()): Capability<typeof GetTimeParams> {
  return {
    name: "get_time",
    description: "Get the current date and time.",
    parameters: GetTimeParams,
    returns: "datetime (ISO 8601), date, time, day of week and unix timestamp",
    category: "system",
    execute: () => describeTime(now()),
  };
}
