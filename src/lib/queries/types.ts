/**
 * Query catalog types
 */

import type { EduHubCollections } from "../database/types.js";

export interface CatalogQueryArgs {
  category?: string;
  courseId?: string;
  title?: string;
  minPrice?: number;
  maxPrice?: number;
  months?: number;
  weeks?: number;
  tags?: string[];
  limit?: number;
}

export interface CatalogQuery {
  description: string;
  run: (cols: EduHubCollections, args: CatalogQueryArgs) => Promise<unknown>;
}
