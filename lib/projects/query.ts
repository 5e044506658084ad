export type ProjectSort = "recent" | "title";

export type ProjectFilters = {
  search?: string;
  category?: string;
  sort?: ProjectSort;
};

/** `/api/projects` URL for the given filters; no filters lists every project, newest first. */
export function projectsUrl(filters: ProjectFilters = {}) {
  const params = new URLSearchParams({ sort: filters.sort ?? "recent" });
  const search = filters.search?.trim();
  if (search) params.set("q", search);
  if (filters.category && filters.category !== "all") params.set("category", filters.category);
  return `/api/projects?${params}`;
}
