/**
 * Hosting API response shapes.
 *
 * Only the fields the orchestrator relies on are declared; unknown fields are
 * dropped during parsing.
 */

import { z } from 'zod';

export const hostingOrgSchema = z.object({
  id: z.number(),
  username: z.string(),
  full_name: z.string().optional(),
  description: z.string().optional(),
  email: z.string().optional(),
  location: z.string().optional(),
  visibility: z.string().optional(),
});

export type HostingOrg = z.infer<typeof hostingOrgSchema>;

export const hostingRepoSchema = z.object({
  id: z.number(),
  name: z.string(),
  full_name: z.string(),
  clone_url: z.string(),
  html_url: z.string().optional(),
  description: z.string().optional(),
  private: z.boolean().optional(),
  empty: z.boolean().optional(),
  default_branch: z.string().optional(),
});

export type HostingRepo = z.infer<typeof hostingRepoSchema>;

export const hostingRepoListSchema = z.array(hostingRepoSchema);

export interface CreateOrgRequest {
  username: string;
  full_name: string;
  description: string;
  email?: string;
  location?: string;
  visibility: 'public' | 'limited' | 'private';
  repo_admin_change_team_access: boolean;
}

export interface CreateRepoRequest {
  name: string;
  description: string;
  private: boolean;
  default_branch: string;
}

/** Largest page size the hosting API accepts. */
export const MAX_PAGE_LIMIT = 100;
