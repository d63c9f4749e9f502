import {
  type Annotation,
  type Measurement,
  type MonitoringEvent,
} from './events.types';
import { ShapingError } from './model';
import { round } from './utils';

export const MAX_NAME_LENGTH = 255;

/**
 * Converts a string into a name accepted for metrics and sources: spaces
 * become periods, anything outside `A-Za-z0-9.:_-` is dropped and the result
 * is cut to 255 characters.
 */
export function safeName(s: string): string {
  return s
    .replace(/ /g, '.')
    .replace(/[^A-Za-z0-9.:_-]/g, '')
    .slice(0, MAX_NAME_LENGTH);
}

export function eventToMeasurement(event: MonitoringEvent): Measurement {
  const name = nameOf(event);
  const value = event.metric;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ShapingError(`Event "${event.service}" has no numeric metric`);
  }

  const measurement: Measurement = {
    name,
    value,
    measureTime: round(timeOf(event, event.time)),
  };
  const source = sourceOf(event);
  if (source !== undefined) measurement.source = source;
  return measurement;
}

export const eventToGauge = eventToMeasurement;
export const eventToCounter = eventToMeasurement;

export function eventToAnnotation(event: MonitoringEvent): Annotation {
  const annotation: Annotation = {
    name: nameOf(event),
    title: [event.service, event.state ?? ''].join(' '),
    startTime: round(timeOf(event, event.time)),
  };

  const source = sourceOf(event);
  if (source !== undefined) annotation.source = source;
  if (event.description !== undefined) annotation.description = event.description;
  if (event.endTime !== undefined) annotation.endTime = round(timeOf(event, event.endTime));
  return annotation;
}

function nameOf(event: MonitoringEvent): string {
  if (typeof event.service !== 'string') {
    throw new ShapingError('Event has no service name');
  }
  const name = safeName(event.service);
  if (name.length === 0) {
    throw new ShapingError(`Service name "${event.service}" is empty once sanitized`);
  }
  return name;
}

function sourceOf(event: MonitoringEvent): string | undefined {
  if (event.host === undefined) return undefined;
  const source = safeName(event.host);
  return source.length > 0 ? source : undefined;
}

function timeOf(event: MonitoringEvent, time: unknown): number {
  if (typeof time !== 'number' || !Number.isFinite(time)) {
    throw new ShapingError(`Event "${event.service}" has an invalid time`);
  }
  return time;
}
