import type { NavigationState } from "./types";

const overview: NavigationState = { page: "overview" };

export const OVERVIEW: NavigationState = Object.freeze(overview);

export function showDetail(facilityId: number): NavigationState {
  const state: NavigationState = { page: "detail", facilityId };
  return Object.freeze(state);
}

export function showOverview(): NavigationState {
  return OVERVIEW;
}

/**
 * A detail page whose facility is gone falls back to the overview instead of
 * failing. `has` is usually `FacilityStore.has`.
 */
export function resolveNavigation(state: NavigationState, has: (id: number) => boolean): NavigationState {
  if (state.page === "detail" && !has(state.facilityId)) return OVERVIEW;
  return state;
}
