import type {
  AlertEvent,
  Category,
  Location,
  Pollutant,
} from "../types/air-quality";
import { compareCategories } from "./classifier-service";

/**
 * Per (location, pollutant) alert state. `forecasted` is the worst
 * forecast category already announced for the current observed level.
 */
export interface AlertState {
  category: Category;
  forecasted: Category | null;
}

export const INITIAL_ALERT_STATE: AlertState = {
  category: "GOOD",
  forecasted: null,
};

export interface AlertInput {
  pollutant: Pollutant;
  locationKey: string;
  /** Latest classified observation, or null when nothing has been observed */
  current: { category: Category; observedAt: number } | null;
  forecast: { timestamp: number; category: Category }[];
  previous: AlertState;
}

export interface AlertEvaluation {
  events: AlertEvent[];
  state: AlertState;
}

export function locationKey(location: Location): string {
  return `${location.lat.toFixed(4)},${location.lon.toFixed(4)}`;
}

/**
 * Emit events for rising transitions only. A repeat or a fall updates the
 * state silently; a forecast rise is announced once until the observed
 * level moves.
 */
export function evaluate(input: AlertInput): AlertEvaluation {
  const { pollutant, current, forecast, previous } = input;
  const events: AlertEvent[] = [];
  let state: AlertState = { ...previous };

  if (current) {
    if (compareCategories(current.category, previous.category) > 0) {
      events.push({
        pollutant,
        locationKey: input.locationKey,
        category: current.category,
        previousCategory: previous.category,
        triggeredAt: current.observedAt,
        reason: "observed",
      });
    }
    if (current.category !== previous.category) {
      state = { category: current.category, forecasted: null };
    }
  }

  let peak: { timestamp: number; category: Category } | undefined;
  for (const step of forecast) {
    if (!peak || compareCategories(step.category, peak.category) > 0) {
      peak = step;
    }
  }

  const announced = state.forecasted;
  if (
    peak &&
    compareCategories(peak.category, state.category) > 0 &&
    (announced === null || compareCategories(peak.category, announced) > 0)
  ) {
    events.push({
      pollutant,
      locationKey: input.locationKey,
      category: peak.category,
      previousCategory: state.category,
      triggeredAt: peak.timestamp,
      reason: "forecasted",
    });
    state = { ...state, forecasted: peak.category };
  }

  return { events, state };
}

/**
 * In-memory store of alert states. Injected into the query service so tests
 * and multiple facades do not share hidden globals.
 */
export class AlertTracker {
  private readonly states = new Map<string, AlertState>();

  get(key: string, pollutant: Pollutant): AlertState {
    return this.states.get(`${key}|${pollutant}`) ?? INITIAL_ALERT_STATE;
  }

  set(key: string, pollutant: Pollutant, state: AlertState): void {
    this.states.set(`${key}|${pollutant}`, state);
  }

  /** Evaluate against the stored state and store the result */
  record(input: Omit<AlertInput, "previous">): AlertEvent[] {
    const { events, state } = evaluate({
      ...input,
      previous: this.get(input.locationKey, input.pollutant),
    });
    this.set(input.locationKey, input.pollutant, state);
    return events;
  }

  clear(): void {
    this.states.clear();
  }
}
