import { z } from 'zod';
import {
  communityVisibilitySchema,
  listingTypeSchema,
  postListingModeSchema,
  registrationModeSchema,
  sortTypeSchema,
} from './enums.js';

/*
 * Database rows as the API exposes them. Optional columns are omitted by the
 * server when empty, so they are `nullish` here.
 */

export const personSchema = z.object({
  id: z.number(),
  name: z.string(),
  display_name: z.string().nullish(),
  avatar: z.string().nullish(),
  banned: z.boolean(),
  published: z.string(),
  updated: z.string().nullish(),
  actor_id: z.string(),
  bio: z.string().nullish(),
  local: z.boolean(),
  banner: z.string().nullish(),
  deleted: z.boolean(),
  matrix_user_id: z.string().nullish(),
  bot_account: z.boolean(),
  ban_expires: z.string().nullish(),
  instance_id: z.number(),
});
export type Person = z.infer<typeof personSchema>;

export const communitySchema = z.object({
  id: z.number(),
  name: z.string(),
  title: z.string(),
  description: z.string().nullish(),
  removed: z.boolean(),
  published: z.string(),
  updated: z.string().nullish(),
  deleted: z.boolean(),
  nsfw: z.boolean(),
  actor_id: z.string(),
  local: z.boolean(),
  icon: z.string().nullish(),
  banner: z.string().nullish(),
  hidden: z.boolean(),
  posting_restricted_to_mods: z.boolean(),
  instance_id: z.number(),
  visibility: communityVisibilitySchema,
});
export type Community = z.infer<typeof communitySchema>;

export const postSchema = z.object({
  id: z.number(),
  name: z.string(),
  url: z.string().nullish(),
  body: z.string().nullish(),
  creator_id: z.number(),
  community_id: z.number(),
  removed: z.boolean(),
  locked: z.boolean(),
  published: z.string(),
  updated: z.string().nullish(),
  deleted: z.boolean(),
  nsfw: z.boolean(),
  embed_title: z.string().nullish(),
  embed_description: z.string().nullish(),
  thumbnail_url: z.string().nullish(),
  ap_id: z.string(),
  local: z.boolean(),
  embed_video_url: z.string().nullish(),
  language_id: z.number(),
  featured_community: z.boolean(),
  featured_local: z.boolean(),
  url_content_type: z.string().nullish(),
  alt_text: z.string().nullish(),
});
export type Post = z.infer<typeof postSchema>;

export const commentSchema = z.object({
  id: z.number(),
  creator_id: z.number(),
  post_id: z.number(),
  content: z.string(),
  removed: z.boolean(),
  published: z.string(),
  updated: z.string().nullish(),
  deleted: z.boolean(),
  ap_id: z.string(),
  local: z.boolean(),
  path: z.string(),
  distinguished: z.boolean(),
  language_id: z.number(),
});
export type Comment = z.infer<typeof commentSchema>;

export const privateMessageSchema = z.object({
  id: z.number(),
  creator_id: z.number(),
  recipient_id: z.number(),
  content: z.string(),
  deleted: z.boolean(),
  read: z.boolean(),
  published: z.string(),
  updated: z.string().nullish(),
  ap_id: z.string(),
  local: z.boolean(),
});
export type PrivateMessage = z.infer<typeof privateMessageSchema>;

export const commentReplySchema = z.object({
  id: z.number(),
  recipient_id: z.number(),
  comment_id: z.number(),
  read: z.boolean(),
  published: z.string(),
});
export type CommentReply = z.infer<typeof commentReplySchema>;

export const personMentionSchema = z.object({
  id: z.number(),
  recipient_id: z.number(),
  comment_id: z.number(),
  read: z.boolean(),
  published: z.string(),
});
export type PersonMention = z.infer<typeof personMentionSchema>;

export const siteSchema = z.object({
  id: z.number(),
  name: z.string(),
  sidebar: z.string().nullish(),
  published: z.string(),
  updated: z.string().nullish(),
  icon: z.string().nullish(),
  banner: z.string().nullish(),
  description: z.string().nullish(),
  actor_id: z.string(),
  last_refreshed_at: z.string(),
  inbox_url: z.string(),
  public_key: z.string(),
  instance_id: z.number(),
  content_warning: z.string().nullish(),
});
export type Site = z.infer<typeof siteSchema>;

export const localSiteSchema = z.object({
  id: z.number(),
  site_id: z.number(),
  site_setup: z.boolean(),
  enable_downvotes: z.boolean(),
  enable_nsfw: z.boolean(),
  community_creation_admin_only: z.boolean(),
  require_email_verification: z.boolean(),
  application_question: z.string().nullish(),
  private_instance: z.boolean(),
  default_theme: z.string(),
  default_post_listing_type: listingTypeSchema,
  legal_information: z.string().nullish(),
  hide_modlog_mod_names: z.boolean(),
  application_email_admins: z.boolean(),
  slur_filter_regex: z.string().nullish(),
  actor_name_max_length: z.number(),
  federation_enabled: z.boolean(),
  captcha_enabled: z.boolean(),
  captcha_difficulty: z.string(),
  published: z.string(),
  updated: z.string().nullish(),
  registration_mode: registrationModeSchema,
  reports_email_admins: z.boolean(),
  federation_signed_fetch: z.boolean(),
  default_post_listing_mode: postListingModeSchema,
  default_sort_type: sortTypeSchema,
});
export type LocalSite = z.infer<typeof localSiteSchema>;

export const localSiteRateLimitSchema = z.object({
  local_site_id: z.number(),
  message: z.number(),
  message_per_second: z.number(),
  post: z.number(),
  post_per_second: z.number(),
  register: z.number(),
  register_per_second: z.number(),
  image: z.number(),
  image_per_second: z.number(),
  comment: z.number(),
  comment_per_second: z.number(),
  search: z.number(),
  search_per_second: z.number(),
  published: z.string(),
  updated: z.string().nullish(),
  import_user_settings: z.number(),
  import_user_settings_per_second: z.number(),
});
export type LocalSiteRateLimit = z.infer<typeof localSiteRateLimitSchema>;

export const localUserSchema = z.object({
  id: z.number(),
  person_id: z.number(),
  email: z.string().nullish(),
  show_nsfw: z.boolean(),
  theme: z.string(),
  default_sort_type: sortTypeSchema,
  default_listing_type: listingTypeSchema,
  interface_language: z.string(),
  show_avatars: z.boolean(),
  send_notifications_to_email: z.boolean(),
  show_scores: z.boolean(),
  show_bot_accounts: z.boolean(),
  show_read_posts: z.boolean(),
  email_verified: z.boolean(),
  accepted_application: z.boolean(),
  open_links_in_new_tab: z.boolean(),
  blur_nsfw: z.boolean(),
  auto_expand: z.boolean(),
  infinite_scroll_enabled: z.boolean(),
  admin: z.boolean(),
  post_listing_mode: postListingModeSchema,
  totp_2fa_enabled: z.boolean(),
  enable_keyboard_navigation: z.boolean(),
  enable_animated_images: z.boolean(),
  collapse_bot_comments: z.boolean(),
});
export type LocalUser = z.infer<typeof localUserSchema>;

export const localUserVoteDisplayModeSchema = z.object({
  local_user_id: z.number(),
  score: z.boolean(),
  upvotes: z.boolean(),
  downvotes: z.boolean(),
  upvote_percentage: z.boolean(),
});
export type LocalUserVoteDisplayMode = z.infer<typeof localUserVoteDisplayModeSchema>;

export const instanceSchema = z.object({
  id: z.number(),
  domain: z.string(),
  published: z.string(),
  updated: z.string().nullish(),
  software: z.string().nullish(),
  version: z.string().nullish(),
});
export type Instance = z.infer<typeof instanceSchema>;

export const federationStateSchema = z.object({
  instance_id: z.number(),
  last_successful_id: z.number().nullish(),
  last_successful_published_time: z.string().nullish(),
  fail_count: z.number(),
  last_retry: z.string().nullish(),
  next_retry: z.string().nullish(),
});
export type FederationState = z.infer<typeof federationStateSchema>;

export const instanceWithFederationStateSchema = instanceSchema.extend({
  federation_state: federationStateSchema.nullish(),
});
export type InstanceWithFederationState = z.infer<typeof instanceWithFederationStateSchema>;

export const languageSchema = z.object({
  id: z.number(),
  code: z.string(),
  name: z.string(),
});
export type Language = z.infer<typeof languageSchema>;

export const taglineSchema = z.object({
  id: z.number(),
  local_site_id: z.number(),
  content: z.string(),
  published: z.string(),
  updated: z.string().nullish(),
});
export type Tagline = z.infer<typeof taglineSchema>;

export const localSiteUrlBlocklistSchema = z.object({
  id: z.number(),
  url: z.string(),
  published: z.string(),
  updated: z.string().nullish(),
});
export type LocalSiteUrlBlocklist = z.infer<typeof localSiteUrlBlocklistSchema>;

export const customEmojiSchema = z.object({
  id: z.number(),
  local_site_id: z.number(),
  shortcode: z.string(),
  image_url: z.string(),
  alt_text: z.string(),
  category: z.string(),
  published: z.string(),
  updated: z.string().nullish(),
});
export type CustomEmoji = z.infer<typeof customEmojiSchema>;

export const customEmojiKeywordSchema = z.object({
  custom_emoji_id: z.number(),
  keyword: z.string(),
});
export type CustomEmojiKeyword = z.infer<typeof customEmojiKeywordSchema>;

export const registrationApplicationSchema = z.object({
  id: z.number(),
  local_user_id: z.number(),
  answer: z.string(),
  admin_id: z.number().nullish(),
  deny_reason: z.string().nullish(),
  published: z.string(),
});
export type RegistrationApplication = z.infer<typeof registrationApplicationSchema>;

export const postReportSchema = z.object({
  id: z.number(),
  creator_id: z.number(),
  post_id: z.number(),
  original_post_name: z.string(),
  original_post_url: z.string().nullish(),
  original_post_body: z.string().nullish(),
  reason: z.string(),
  resolved: z.boolean(),
  resolver_id: z.number().nullish(),
  published: z.string(),
  updated: z.string().nullish(),
});
export type PostReport = z.infer<typeof postReportSchema>;

export const commentReportSchema = z.object({
  id: z.number(),
  creator_id: z.number(),
  comment_id: z.number(),
  original_comment_text: z.string(),
  reason: z.string(),
  resolved: z.boolean(),
  resolver_id: z.number().nullish(),
  published: z.string(),
  updated: z.string().nullish(),
});
export type CommentReport = z.infer<typeof commentReportSchema>;

export const privateMessageReportSchema = z.object({
  id: z.number(),
  creator_id: z.number(),
  private_message_id: z.number(),
  original_pm_text: z.string(),
  reason: z.string(),
  resolved: z.boolean(),
  resolver_id: z.number().nullish(),
  published: z.string(),
  updated: z.string().nullish(),
});
export type PrivateMessageReport = z.infer<typeof privateMessageReportSchema>;

export const loginTokenSchema = z.object({
  user_id: z.number(),
  published: z.string(),
  ip: z.string().nullish(),
  user_agent: z.string().nullish(),
});
export type LoginToken = z.infer<typeof loginTokenSchema>;

export const imageDetailsSchema = z.object({
  link: z.string(),
  width: z.number(),
  height: z.number(),
  content_type: z.string(),
});
export type ImageDetails = z.infer<typeof imageDetailsSchema>;

export const linkMetadataSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  image: z.string().nullish(),
  embed_video_url: z.string().nullish(),
  content_type: z.string().nullish(),
});
export type LinkMetadata = z.infer<typeof linkMetadataSchema>;

export const captchaResponseSchema = z.object({
  png: z.string(),
  wav: z.string(),
  uuid: z.string(),
});
export type CaptchaResponse = z.infer<typeof captchaResponseSchema>;

/*
 * Moderation log rows, `when_` is the time of the action.
 */

const modActionSchema = z.object({
  id: z.number(),
  mod_person_id: z.number(),
  when_: z.string(),
});

export const modRemovePostSchema = modActionSchema.extend({
  post_id: z.number(),
  reason: z.string().nullish(),
  removed: z.boolean(),
});
export type ModRemovePost = z.infer<typeof modRemovePostSchema>;

export const modLockPostSchema = modActionSchema.extend({
  post_id: z.number(),
  locked: z.boolean(),
});
export type ModLockPost = z.infer<typeof modLockPostSchema>;

export const modFeaturePostSchema = modActionSchema.extend({
  post_id: z.number(),
  featured: z.boolean(),
  is_featured_community: z.boolean(),
});
export type ModFeaturePost = z.infer<typeof modFeaturePostSchema>;

export const modRemoveCommentSchema = modActionSchema.extend({
  comment_id: z.number(),
  reason: z.string().nullish(),
  removed: z.boolean(),
});
export type ModRemoveComment = z.infer<typeof modRemoveCommentSchema>;

export const modRemoveCommunitySchema = modActionSchema.extend({
  community_id: z.number(),
  reason: z.string().nullish(),
  removed: z.boolean(),
});
export type ModRemoveCommunity = z.infer<typeof modRemoveCommunitySchema>;

export const modBanFromCommunitySchema = modActionSchema.extend({
  other_person_id: z.number(),
  community_id: z.number(),
  reason: z.string().nullish(),
  banned: z.boolean(),
  expires: z.string().nullish(),
});
export type ModBanFromCommunity = z.infer<typeof modBanFromCommunitySchema>;

export const modBanSchema = modActionSchema.extend({
  other_person_id: z.number(),
  reason: z.string().nullish(),
  banned: z.boolean(),
  expires: z.string().nullish(),
});
export type ModBan = z.infer<typeof modBanSchema>;

export const modAddCommunitySchema = modActionSchema.extend({
  other_person_id: z.number(),
  community_id: z.number(),
  removed: z.boolean(),
});
export type ModAddCommunity = z.infer<typeof modAddCommunitySchema>;

export const modTransferCommunitySchema = modActionSchema.extend({
  other_person_id: z.number(),
  community_id: z.number(),
});
export type ModTransferCommunity = z.infer<typeof modTransferCommunitySchema>;

export const modAddSchema = modActionSchema.extend({
  other_person_id: z.number(),
  removed: z.boolean(),
});
export type ModAdd = z.infer<typeof modAddSchema>;

export const modHideCommunitySchema = modActionSchema.extend({
  community_id: z.number(),
  reason: z.string().nullish(),
  hidden: z.boolean(),
});
export type ModHideCommunity = z.infer<typeof modHideCommunitySchema>;

const adminPurgeSchema = z.object({
  id: z.number(),
  admin_person_id: z.number(),
  reason: z.string().nullish(),
  when_: z.string(),
});

export const adminPurgePersonSchema = adminPurgeSchema;
export type AdminPurgePerson = z.infer<typeof adminPurgePersonSchema>;

export const adminPurgeCommunitySchema = adminPurgeSchema;
export type AdminPurgeCommunity = z.infer<typeof adminPurgeCommunitySchema>;

export const adminPurgePostSchema = adminPurgeSchema.extend({
  community_id: z.number(),
});
export type AdminPurgePost = z.infer<typeof adminPurgePostSchema>;

export const adminPurgeCommentSchema = adminPurgeSchema.extend({
  post_id: z.number(),
});
export type AdminPurgeComment = z.infer<typeof adminPurgeCommentSchema>;
