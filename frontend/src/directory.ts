import type { FacilityStore } from "./catalog";
import { MESSAGES } from "./config";
import { applyFilters, INITIAL_CRITERIA, updateCriteria } from "./filters";
import { submitInquiry, type InquiryForm, type InquiryResult, type NotificationSender } from "./inquiry";
import { OVERVIEW, resolveNavigation, showDetail, showOverview } from "./navigation";
import type { Facility, FacilityResult, FilterCriteria, NavigationState } from "./types";

export interface DirectoryState {
  readonly criteria: FilterCriteria;
  readonly results: readonly FacilityResult[];
  readonly navigation: NavigationState;
  /** One-shot message for the view, cleared by the next action. */
  readonly notice: string | null;
}

type Listener = (state: DirectoryState) => void;

interface DirectoryOptions {
  sender: NotificationSender;
  initialCriteria?: FilterCriteria;
  initialNavigation?: NavigationState;
}

/**
 * Owns the current criteria snapshot and navigation state. Every action
 * builds a new state and recomputes the result set from the catalog.
 */
export class DirectoryController {
  private readonly store: FacilityStore;
  private readonly sender: NotificationSender;
  private readonly listeners = new Set<Listener>();
  private state: DirectoryState;

  constructor(store: FacilityStore, { sender, initialCriteria, initialNavigation }: DirectoryOptions) {
    this.store = store;
    this.sender = sender;

    const criteria = updateCriteria(store.all, INITIAL_CRITERIA, initialCriteria ?? {});
    const requested = initialNavigation ?? OVERVIEW;
    const navigation = resolveNavigation(requested, (id) => store.has(id));
    this.state = {
      criteria,
      results: applyFilters(store.all, criteria),
      navigation,
      notice: navigation === requested ? null : MESSAGES.notFound,
    };
  }

  getState(): DirectoryState {
    return this.state;
  }

  /** Facility of the open detail page, if any. */
  selectedFacility(): Facility | undefined {
    const nav = this.state.navigation;
    return nav.page === "detail" ? this.store.get(nav.facilityId) : undefined;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    listener(this.state);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setFilterCriteria(partial: Partial<FilterCriteria>): void {
    const criteria = updateCriteria(this.store.all, this.state.criteria, partial);
    this.commit({ ...this.state, criteria, results: applyFilters(this.store.all, criteria), notice: null });
  }

  resetFilters(): void {
    const criteria = INITIAL_CRITERIA;
    this.commit({ ...this.state, criteria, results: applyFilters(this.store.all, criteria), notice: null });
  }

  selectFacility(id: number): void {
    const navigation = resolveNavigation(showDetail(id), (known) => this.store.has(known));
    if (navigation.page === "overview") console.warn(`Facility #${id} not found, showing overview`);
    this.commit({
      ...this.state,
      navigation,
      notice: navigation.page === "overview" ? MESSAGES.notFound : null,
    });
  }

  goBack(): void {
    this.commit({ ...this.state, navigation: showOverview(), notice: null });
  }

  submitInquiry(form: InquiryForm): Promise<InquiryResult> {
    return submitInquiry(this.selectedFacility(), form, this.sender);
  }

  private commit(next: DirectoryState): void {
    this.state = next;
    for (const listener of this.listeners) listener(next);
  }
}
