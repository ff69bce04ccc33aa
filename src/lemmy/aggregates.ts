import { z } from 'zod';

export const personAggregatesSchema = z.object({
  person_id: z.number(),
  post_count: z.number(),
  comment_count: z.number(),
});
export type PersonAggregates = z.infer<typeof personAggregatesSchema>;

export const communityAggregatesSchema = z.object({
  community_id: z.number(),
  subscribers: z.number(),
  posts: z.number(),
  comments: z.number(),
  published: z.string(),
  users_active_day: z.number(),
  users_active_week: z.number(),
  users_active_month: z.number(),
  users_active_half_year: z.number(),
  subscribers_local: z.number(),
});
export type CommunityAggregates = z.infer<typeof communityAggregatesSchema>;

export const postAggregatesSchema = z.object({
  post_id: z.number(),
  comments: z.number(),
  score: z.number(),
  upvotes: z.number(),
  downvotes: z.number(),
  published: z.string(),
  newest_comment_time: z.string(),
});
export type PostAggregates = z.infer<typeof postAggregatesSchema>;

export const commentAggregatesSchema = z.object({
  comment_id: z.number(),
  score: z.number(),
  upvotes: z.number(),
  downvotes: z.number(),
  published: z.string(),
  child_count: z.number(),
});
export type CommentAggregates = z.infer<typeof commentAggregatesSchema>;

export const siteAggregatesSchema = z.object({
  site_id: z.number(),
  users: z.number(),
  posts: z.number(),
  comments: z.number(),
  communities: z.number(),
  users_active_day: z.number(),
  users_active_week: z.number(),
  users_active_month: z.number(),
  users_active_half_year: z.number(),
});
export type SiteAggregates = z.infer<typeof siteAggregatesSchema>;
