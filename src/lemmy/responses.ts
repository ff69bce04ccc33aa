import { z } from 'zod';
import { searchTypeSchema } from './enums.js';
import {
  captchaResponseSchema,
  instanceWithFederationStateSchema,
  languageSchema,
  linkMetadataSchema,
  localSiteUrlBlocklistSchema,
  loginTokenSchema,
  siteSchema,
  taglineSchema,
} from './source.js';
import {
  adminPurgeCommentViewSchema,
  adminPurgeCommunityViewSchema,
  adminPurgePersonViewSchema,
  adminPurgePostViewSchema,
  commentReplyViewSchema,
  commentReportViewSchema,
  commentViewSchema,
  communityModeratorViewSchema,
  communityViewSchema,
  customEmojiViewSchema,
  modAddCommunityViewSchema,
  modAddViewSchema,
  modBanFromCommunityViewSchema,
  modBanViewSchema,
  modFeaturePostViewSchema,
  modHideCommunityViewSchema,
  modLockPostViewSchema,
  modRemoveCommentViewSchema,
  modRemoveCommunityViewSchema,
  modRemovePostViewSchema,
  modTransferCommunityViewSchema,
  myUserInfoSchema,
  personMentionViewSchema,
  personViewSchema,
  postReportViewSchema,
  postViewSchema,
  privateMessageReportViewSchema,
  privateMessageViewSchema,
  registrationApplicationViewSchema,
  siteViewSchema,
  voteViewSchema,
} from './views.js';

export const successResponseSchema = z.object({
  success: z.boolean(),
});
export type SuccessResponse = z.infer<typeof successResponseSchema>;

// Site

export const getSiteResponseSchema = z.object({
  site_view: siteViewSchema,
  admins: z.array(personViewSchema),
  version: z.string(),
  my_user: myUserInfoSchema.nullish(),
  all_languages: z.array(languageSchema),
  discussion_languages: z.array(z.number()),
  taglines: z.array(taglineSchema),
  custom_emojis: z.array(customEmojiViewSchema),
  blocked_urls: z.array(localSiteUrlBlocklistSchema),
});
export type GetSiteResponse = z.infer<typeof getSiteResponseSchema>;

export const siteResponseSchema = z.object({
  site_view: siteViewSchema,
  taglines: z.array(taglineSchema),
});
export type SiteResponse = z.infer<typeof siteResponseSchema>;

export const blockInstanceResponseSchema = z.object({
  blocked: z.boolean(),
});
export type BlockInstanceResponse = z.infer<typeof blockInstanceResponseSchema>;

export const getModlogResponseSchema = z.object({
  removed_posts: z.array(modRemovePostViewSchema),
  locked_posts: z.array(modLockPostViewSchema),
  featured_posts: z.array(modFeaturePostViewSchema),
  removed_comments: z.array(modRemoveCommentViewSchema),
  removed_communities: z.array(modRemoveCommunityViewSchema),
  banned_from_community: z.array(modBanFromCommunityViewSchema),
  banned: z.array(modBanViewSchema),
  added_to_community: z.array(modAddCommunityViewSchema),
  transferred_to_community: z.array(modTransferCommunityViewSchema),
  added: z.array(modAddViewSchema),
  admin_purged_persons: z.array(adminPurgePersonViewSchema),
  admin_purged_communities: z.array(adminPurgeCommunityViewSchema),
  admin_purged_posts: z.array(adminPurgePostViewSchema),
  admin_purged_comments: z.array(adminPurgeCommentViewSchema),
  hidden_communities: z.array(modHideCommunityViewSchema),
});
export type GetModlogResponse = z.infer<typeof getModlogResponseSchema>;

export const searchResponseSchema = z.object({
  type_: searchTypeSchema,
  comments: z.array(commentViewSchema),
  posts: z.array(postViewSchema),
  communities: z.array(communityViewSchema),
  users: z.array(personViewSchema),
});
export type SearchResponse = z.infer<typeof searchResponseSchema>;

/** Exactly one of the fields is set for a resolved object. */
export const resolveObjectResponseSchema = z.object({
  comment: commentViewSchema.nullish(),
  post: postViewSchema.nullish(),
  community: communityViewSchema.nullish(),
  person: personViewSchema.nullish(),
});
export type ResolveObjectResponse = z.infer<typeof resolveObjectResponseSchema>;

export const federatedInstancesSchema = z.object({
  linked: z.array(instanceWithFederationStateSchema),
  allowed: z.array(instanceWithFederationStateSchema),
  blocked: z.array(instanceWithFederationStateSchema),
});
export type FederatedInstances = z.infer<typeof federatedInstancesSchema>;

export const getFederatedInstancesResponseSchema = z.object({
  federated_instances: federatedInstancesSchema.nullish(),
});
export type GetFederatedInstancesResponse = z.infer<typeof getFederatedInstancesResponseSchema>;

// Admin

export const listRegistrationApplicationsResponseSchema = z.object({
  registration_applications: z.array(registrationApplicationViewSchema),
});
export type ListRegistrationApplicationsResponse = z.infer<typeof listRegistrationApplicationsResponseSchema>;

export const getUnreadRegistrationApplicationCountResponseSchema = z.object({
  registration_applications: z.number(),
});
export type GetUnreadRegistrationApplicationCountResponse = z.infer<
  typeof getUnreadRegistrationApplicationCountResponseSchema
>;

export const registrationApplicationResponseSchema = z.object({
  registration_application: registrationApplicationViewSchema,
});
export type RegistrationApplicationResponse = z.infer<typeof registrationApplicationResponseSchema>;

export const addAdminResponseSchema = z.object({
  admins: z.array(personViewSchema),
});
export type AddAdminResponse = z.infer<typeof addAdminResponseSchema>;

// User

/** `ok` is absent when the site has captchas disabled. */
export const getCaptchaResponseSchema = z.object({
  ok: captchaResponseSchema.nullish(),
});
export type GetCaptchaResponse = z.infer<typeof getCaptchaResponseSchema>;

export const loginResponseSchema = z.object({
  jwt: z.string().nullish(),
  registration_created: z.boolean(),
  verify_email_sent: z.boolean(),
});
export type LoginResponse = z.infer<typeof loginResponseSchema>;

export const getPersonDetailsResponseSchema = z.object({
  person_view: personViewSchema,
  site: siteSchema.nullish(),
  comments: z.array(commentViewSchema),
  posts: z.array(postViewSchema),
  moderates: z.array(communityModeratorViewSchema),
});
export type GetPersonDetailsResponse = z.infer<typeof getPersonDetailsResponseSchema>;

export const getPersonMentionsResponseSchema = z.object({
  mentions: z.array(personMentionViewSchema),
});
export type GetPersonMentionsResponse = z.infer<typeof getPersonMentionsResponseSchema>;

export const personMentionResponseSchema = z.object({
  person_mention_view: personMentionViewSchema,
});
export type PersonMentionResponse = z.infer<typeof personMentionResponseSchema>;

export const getRepliesResponseSchema = z.object({
  replies: z.array(commentReplyViewSchema),
});
export type GetRepliesResponse = z.infer<typeof getRepliesResponseSchema>;

export const commentReplyResponseSchema = z.object({
  comment_reply_view: commentReplyViewSchema,
});
export type CommentReplyResponse = z.infer<typeof commentReplyResponseSchema>;

export const banPersonResponseSchema = z.object({
  person_view: personViewSchema,
  banned: z.boolean(),
});
export type BanPersonResponse = z.infer<typeof banPersonResponseSchema>;

export const bannedPersonsResponseSchema = z.object({
  banned: z.array(personViewSchema),
});
export type BannedPersonsResponse = z.infer<typeof bannedPersonsResponseSchema>;

export const blockPersonResponseSchema = z.object({
  person_view: personViewSchema,
  blocked: z.boolean(),
});
export type BlockPersonResponse = z.infer<typeof blockPersonResponseSchema>;

export const getReportCountResponseSchema = z.object({
  community_id: z.number().nullish(),
  comment_reports: z.number(),
  post_reports: z.number(),
  private_message_reports: z.number().nullish(),
});
export type GetReportCountResponse = z.infer<typeof getReportCountResponseSchema>;

export const getUnreadCountResponseSchema = z.object({
  replies: z.number(),
  mentions: z.number(),
  private_messages: z.number(),
});
export type GetUnreadCountResponse = z.infer<typeof getUnreadCountResponseSchema>;

export const generateTotpSecretResponseSchema = z.object({
  totp_secret_url: z.string(),
});
export type GenerateTotpSecretResponse = z.infer<typeof generateTotpSecretResponseSchema>;

export const updateTotpResponseSchema = z.object({
  enabled: z.boolean(),
});
export type UpdateTotpResponse = z.infer<typeof updateTotpResponseSchema>;

export const listLoginsResponseSchema = z.array(loginTokenSchema);
export type ListLoginsResponse = z.infer<typeof listLoginsResponseSchema>;

// Community

export const getCommunityResponseSchema = z.object({
  community_view: communityViewSchema,
  site: siteSchema.nullish(),
  moderators: z.array(communityModeratorViewSchema),
  discussion_languages: z.array(z.number()),
});
export type GetCommunityResponse = z.infer<typeof getCommunityResponseSchema>;

export const communityResponseSchema = z.object({
  community_view: communityViewSchema,
  discussion_languages: z.array(z.number()),
});
export type CommunityResponse = z.infer<typeof communityResponseSchema>;

export const listCommunitiesResponseSchema = z.object({
  communities: z.array(communityViewSchema),
});
export type ListCommunitiesResponse = z.infer<typeof listCommunitiesResponseSchema>;

export const blockCommunityResponseSchema = z.object({
  community_view: communityViewSchema,
  blocked: z.boolean(),
});
export type BlockCommunityResponse = z.infer<typeof blockCommunityResponseSchema>;

export const banFromCommunityResponseSchema = z.object({
  person_view: personViewSchema,
  banned: z.boolean(),
});
export type BanFromCommunityResponse = z.infer<typeof banFromCommunityResponseSchema>;

export const addModToCommunityResponseSchema = z.object({
  moderators: z.array(communityModeratorViewSchema),
});
export type AddModToCommunityResponse = z.infer<typeof addModToCommunityResponseSchema>;

// Post

export const getPostResponseSchema = z.object({
  post_view: postViewSchema,
  community_view: communityViewSchema,
  moderators: z.array(communityModeratorViewSchema),
  cross_posts: z.array(postViewSchema),
});
export type GetPostResponse = z.infer<typeof getPostResponseSchema>;

export const postResponseSchema = z.object({
  post_view: postViewSchema,
});
export type PostResponse = z.infer<typeof postResponseSchema>;

export const getPostsResponseSchema = z.object({
  posts: z.array(postViewSchema),
  next_page: z.string().nullish(),
});
export type GetPostsResponse = z.infer<typeof getPostsResponseSchema>;

export const listPostLikesResponseSchema = z.object({
  post_likes: z.array(voteViewSchema),
});
export type ListPostLikesResponse = z.infer<typeof listPostLikesResponseSchema>;

export const postReportResponseSchema = z.object({
  post_report_view: postReportViewSchema,
});
export type PostReportResponse = z.infer<typeof postReportResponseSchema>;

export const listPostReportsResponseSchema = z.object({
  post_reports: z.array(postReportViewSchema),
});
export type ListPostReportsResponse = z.infer<typeof listPostReportsResponseSchema>;

export const getSiteMetadataResponseSchema = z.object({
  metadata: linkMetadataSchema,
});
export type GetSiteMetadataResponse = z.infer<typeof getSiteMetadataResponseSchema>;

// Comment

export const commentResponseSchema = z.object({
  comment_view: commentViewSchema,
  recipient_ids: z.array(z.number()),
});
export type CommentResponse = z.infer<typeof commentResponseSchema>;

export const getCommentsResponseSchema = z.object({
  comments: z.array(commentViewSchema),
});
export type GetCommentsResponse = z.infer<typeof getCommentsResponseSchema>;

export const listCommentLikesResponseSchema = z.object({
  comment_likes: z.array(voteViewSchema),
});
export type ListCommentLikesResponse = z.infer<typeof listCommentLikesResponseSchema>;

export const commentReportResponseSchema = z.object({
  comment_report_view: commentReportViewSchema,
});
export type CommentReportResponse = z.infer<typeof commentReportResponseSchema>;

export const listCommentReportsResponseSchema = z.object({
  comment_reports: z.array(commentReportViewSchema),
});
export type ListCommentReportsResponse = z.infer<typeof listCommentReportsResponseSchema>;

// Private message

export const privateMessagesResponseSchema = z.object({
  private_messages: z.array(privateMessageViewSchema),
});
export type PrivateMessagesResponse = z.infer<typeof privateMessagesResponseSchema>;

export const privateMessageResponseSchema = z.object({
  private_message_view: privateMessageViewSchema,
});
export type PrivateMessageResponse = z.infer<typeof privateMessageResponseSchema>;

export const privateMessageReportResponseSchema = z.object({
  private_message_report_view: privateMessageReportViewSchema,
});
export type PrivateMessageReportResponse = z.infer<typeof privateMessageReportResponseSchema>;

export const listPrivateMessageReportsResponseSchema = z.object({
  private_message_reports: z.array(privateMessageReportViewSchema),
});
export type ListPrivateMessageReportsResponse = z.infer<typeof listPrivateMessageReportsResponseSchema>;

// Custom emoji

export const customEmojiResponseSchema = z.object({
  custom_emoji: customEmojiViewSchema,
});
export type CustomEmojiResponse = z.infer<typeof customEmojiResponseSchema>;
