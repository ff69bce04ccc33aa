import { z } from 'zod';
import {
  commentAggregatesSchema,
  communityAggregatesSchema,
  personAggregatesSchema,
  postAggregatesSchema,
  siteAggregatesSchema,
} from './aggregates.js';
import { subscribedTypeSchema } from './enums.js';
import {
  adminPurgeCommentSchema,
  adminPurgeCommunitySchema,
  adminPurgePersonSchema,
  adminPurgePostSchema,
  commentReplySchema,
  commentReportSchema,
  commentSchema,
  communitySchema,
  customEmojiKeywordSchema,
  customEmojiSchema,
  imageDetailsSchema,
  instanceSchema,
  localSiteRateLimitSchema,
  localSiteSchema,
  localUserSchema,
  localUserVoteDisplayModeSchema,
  modAddCommunitySchema,
  modAddSchema,
  modBanFromCommunitySchema,
  modBanSchema,
  modFeaturePostSchema,
  modHideCommunitySchema,
  modLockPostSchema,
  modRemoveCommentSchema,
  modRemoveCommunitySchema,
  modRemovePostSchema,
  modTransferCommunitySchema,
  personMentionSchema,
  personSchema,
  postReportSchema,
  postSchema,
  privateMessageReportSchema,
  privateMessageSchema,
  registrationApplicationSchema,
  siteSchema,
} from './source.js';

/*
 * Joined rows returned by list and detail endpoints. `my_vote` and the saved/read
 * flags describe the calling user and are only meaningful with a token.
 */

export const personViewSchema = z.object({
  person: personSchema,
  counts: personAggregatesSchema,
  is_admin: z.boolean(),
});
export type PersonView = z.infer<typeof personViewSchema>;

export const localUserViewSchema = z.object({
  local_user: localUserSchema,
  local_user_vote_display_mode: localUserVoteDisplayModeSchema,
  person: personSchema,
  counts: personAggregatesSchema,
});
export type LocalUserView = z.infer<typeof localUserViewSchema>;

export const communityViewSchema = z.object({
  community: communitySchema,
  subscribed: subscribedTypeSchema,
  blocked: z.boolean(),
  counts: communityAggregatesSchema,
  banned_from_community: z.boolean(),
});
export type CommunityView = z.infer<typeof communityViewSchema>;

export const communityModeratorViewSchema = z.object({
  community: communitySchema,
  moderator: personSchema,
});
export type CommunityModeratorView = z.infer<typeof communityModeratorViewSchema>;

export const communityFollowerViewSchema = z.object({
  community: communitySchema,
  follower: personSchema,
});
export type CommunityFollowerView = z.infer<typeof communityFollowerViewSchema>;

export const communityBlockViewSchema = z.object({
  person: personSchema,
  community: communitySchema,
});
export type CommunityBlockView = z.infer<typeof communityBlockViewSchema>;

export const personBlockViewSchema = z.object({
  person: personSchema,
  target: personSchema,
});
export type PersonBlockView = z.infer<typeof personBlockViewSchema>;

export const instanceBlockViewSchema = z.object({
  person: personSchema,
  instance: instanceSchema,
  site: siteSchema.nullish(),
});
export type InstanceBlockView = z.infer<typeof instanceBlockViewSchema>;

export const postViewSchema = z.object({
  post: postSchema,
  creator: personSchema,
  community: communitySchema,
  image_details: imageDetailsSchema.nullish(),
  creator_banned_from_community: z.boolean(),
  banned_from_community: z.boolean(),
  creator_is_moderator: z.boolean(),
  creator_is_admin: z.boolean(),
  counts: postAggregatesSchema,
  subscribed: subscribedTypeSchema,
  saved: z.boolean(),
  read: z.boolean(),
  hidden: z.boolean(),
  creator_blocked: z.boolean(),
  my_vote: z.number().nullish(),
  unread_comments: z.number(),
});
export type PostView = z.infer<typeof postViewSchema>;

export const commentViewSchema = z.object({
  comment: commentSchema,
  creator: personSchema,
  post: postSchema,
  community: communitySchema,
  counts: commentAggregatesSchema,
  creator_banned_from_community: z.boolean(),
  banned_from_community: z.boolean(),
  creator_is_moderator: z.boolean(),
  creator_is_admin: z.boolean(),
  subscribed: subscribedTypeSchema,
  saved: z.boolean(),
  creator_blocked: z.boolean(),
  my_vote: z.number().nullish(),
});
export type CommentView = z.infer<typeof commentViewSchema>;

export const commentReplyViewSchema = commentViewSchema
  .omit({ banned_from_community: true })
  .extend({
    comment_reply: commentReplySchema,
    recipient: personSchema,
  });
export type CommentReplyView = z.infer<typeof commentReplyViewSchema>;

export const personMentionViewSchema = commentViewSchema
  .omit({ banned_from_community: true })
  .extend({
    person_mention: personMentionSchema,
    recipient: personSchema,
  });
export type PersonMentionView = z.infer<typeof personMentionViewSchema>;

export const privateMessageViewSchema = z.object({
  private_message: privateMessageSchema,
  creator: personSchema,
  recipient: personSchema,
});
export type PrivateMessageView = z.infer<typeof privateMessageViewSchema>;

export const postReportViewSchema = z.object({
  post_report: postReportSchema,
  post: postSchema,
  community: communitySchema,
  creator: personSchema,
  post_creator: personSchema,
  creator_banned_from_community: z.boolean(),
  creator_is_moderator: z.boolean(),
  creator_is_admin: z.boolean(),
  subscribed: subscribedTypeSchema,
  saved: z.boolean(),
  read: z.boolean(),
  hidden: z.boolean(),
  creator_blocked: z.boolean(),
  my_vote: z.number().nullish(),
  unread_comments: z.number(),
  counts: postAggregatesSchema,
  resolver: personSchema.nullish(),
});
export type PostReportView = z.infer<typeof postReportViewSchema>;

export const commentReportViewSchema = z.object({
  comment_report: commentReportSchema,
  comment: commentSchema,
  post: postSchema,
  community: communitySchema,
  creator: personSchema,
  comment_creator: personSchema,
  counts: commentAggregatesSchema,
  creator_banned_from_community: z.boolean(),
  creator_is_moderator: z.boolean(),
  creator_is_admin: z.boolean(),
  creator_blocked: z.boolean(),
  subscribed: subscribedTypeSchema,
  saved: z.boolean(),
  my_vote: z.number().nullish(),
  resolver: personSchema.nullish(),
});
export type CommentReportView = z.infer<typeof commentReportViewSchema>;

export const privateMessageReportViewSchema = z.object({
  private_message_report: privateMessageReportSchema,
  private_message: privateMessageSchema,
  private_message_creator: personSchema,
  creator: personSchema,
  resolver: personSchema.nullish(),
});
export type PrivateMessageReportView = z.infer<typeof privateMessageReportViewSchema>;

export const registrationApplicationViewSchema = z.object({
  registration_application: registrationApplicationSchema,
  creator_local_user: localUserSchema,
  creator: personSchema,
  admin: personSchema.nullish(),
});
export type RegistrationApplicationView = z.infer<typeof registrationApplicationViewSchema>;

export const siteViewSchema = z.object({
  site: siteSchema,
  local_site: localSiteSchema,
  local_site_rate_limit: localSiteRateLimitSchema,
  counts: siteAggregatesSchema,
});
export type SiteView = z.infer<typeof siteViewSchema>;

export const customEmojiViewSchema = z.object({
  custom_emoji: customEmojiSchema,
  keywords: z.array(customEmojiKeywordSchema),
});
export type CustomEmojiView = z.infer<typeof customEmojiViewSchema>;

export const myUserInfoSchema = z.object({
  local_user_view: localUserViewSchema,
  follows: z.array(communityFollowerViewSchema),
  moderates: z.array(communityModeratorViewSchema),
  community_blocks: z.array(communityBlockViewSchema),
  instance_blocks: z.array(instanceBlockViewSchema),
  person_blocks: z.array(personBlockViewSchema),
  discussion_languages: z.array(z.number()),
});
export type MyUserInfo = z.infer<typeof myUserInfoSchema>;

/*
 * Moderation log views. The acting moderator is hidden when the site sets
 * `hide_modlog_mod_names`.
 */

export const modRemovePostViewSchema = z.object({
  mod_remove_post: modRemovePostSchema,
  moderator: personSchema.nullish(),
  post: postSchema,
  community: communitySchema,
});

export const modLockPostViewSchema = z.object({
  mod_lock_post: modLockPostSchema,
  moderator: personSchema.nullish(),
  post: postSchema,
  community: communitySchema,
});

export const modFeaturePostViewSchema = z.object({
  mod_feature_post: modFeaturePostSchema,
  moderator: personSchema.nullish(),
  post: postSchema,
  community: communitySchema,
});

export const modRemoveCommentViewSchema = z.object({
  mod_remove_comment: modRemoveCommentSchema,
  moderator: personSchema.nullish(),
  comment: commentSchema,
  commenter: personSchema,
  post: postSchema,
  community: communitySchema,
});

export const modRemoveCommunityViewSchema = z.object({
  mod_remove_community: modRemoveCommunitySchema,
  moderator: personSchema.nullish(),
  community: communitySchema,
});

export const modBanFromCommunityViewSchema = z.object({
  mod_ban_from_community: modBanFromCommunitySchema,
  moderator: personSchema.nullish(),
  community: communitySchema,
  banned_person: personSchema,
});

export const modBanViewSchema = z.object({
  mod_ban: modBanSchema,
  moderator: personSchema.nullish(),
  banned_person: personSchema,
});

export const modAddCommunityViewSchema = z.object({
  mod_add_community: modAddCommunitySchema,
  moderator: personSchema.nullish(),
  community: communitySchema,
  modded_person: personSchema,
});

export const modTransferCommunityViewSchema = z.object({
  mod_transfer_community: modTransferCommunitySchema,
  moderator: personSchema.nullish(),
  community: communitySchema,
  modded_person: personSchema,
});

export const modAddViewSchema = z.object({
  mod_add: modAddSchema,
  moderator: personSchema.nullish(),
  modded_person: personSchema,
});

export const modHideCommunityViewSchema = z.object({
  mod_hide_community: modHideCommunitySchema,
  admin: personSchema.nullish(),
  community: communitySchema,
});

export const adminPurgePersonViewSchema = z.object({
  admin_purge_person: adminPurgePersonSchema,
  admin: personSchema.nullish(),
});

export const adminPurgeCommunityViewSchema = z.object({
  admin_purge_community: adminPurgeCommunitySchema,
  admin: personSchema.nullish(),
});

export const adminPurgePostViewSchema = z.object({
  admin_purge_post: adminPurgePostSchema,
  admin: personSchema.nullish(),
  community: communitySchema,
});

export const adminPurgeCommentViewSchema = z.object({
  admin_purge_comment: adminPurgeCommentSchema,
  admin: personSchema.nullish(),
  post: postSchema,
});

export const voteViewSchema = z.object({
  creator: personSchema,
  creator_banned_from_community: z.boolean(),
  score: z.number(),
});
export type VoteView = z.infer<typeof voteViewSchema>;
