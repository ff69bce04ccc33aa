import type {
  CommentSortType,
  CommunityVisibility,
  ListingType,
  ModlogActionType,
  PostFeatureType,
  PostListingMode,
  RegistrationMode,
  SearchType,
  SortType,
} from './enums.js';

/*
 * Request payloads. GET forms are sent as query strings, so their fields must stay
 * scalar; POST and PUT forms are sent as JSON bodies.
 */

/** Form of the endpoints that take no input. */
export type EmptyForm = Record<string, never>;

// Site

export interface CreateSite {
  name: string;
  sidebar?: string;
  description?: string;
  icon?: string;
  banner?: string;
  enable_downvotes?: boolean;
  enable_nsfw?: boolean;
  community_creation_admin_only?: boolean;
  require_email_verification?: boolean;
  application_question?: string;
  private_instance?: boolean;
  default_theme?: string;
  default_post_listing_type?: ListingType;
  default_sort_type?: SortType;
  legal_information?: string;
  application_email_admins?: boolean;
  hide_modlog_mod_names?: boolean;
  discussion_languages?: number[];
  slur_filter_regex?: string;
  actor_name_max_length?: number;
  federation_enabled?: boolean;
  captcha_enabled?: boolean;
  captcha_difficulty?: string;
  allowed_instances?: string[];
  blocked_instances?: string[];
  taglines?: string[];
  registration_mode?: RegistrationMode;
  content_warning?: string;
  default_post_listing_mode?: PostListingMode;
}

export interface EditSite extends Partial<CreateSite> {
  blocked_urls?: string[];
  reports_email_admins?: boolean;
}

export interface BlockInstance {
  instance_id: number;
  block: boolean;
}

export interface GetModlog {
  mod_person_id?: number;
  community_id?: number;
  page?: number;
  limit?: number;
  type_?: ModlogActionType;
  other_person_id?: number;
  post_id?: number;
  comment_id?: number;
}

export interface Search {
  q: string;
  community_id?: number;
  community_name?: string;
  creator_id?: number;
  type_?: SearchType;
  sort?: SortType;
  listing_type?: ListingType;
  page?: number;
  limit?: number;
}

export interface ResolveObject {
  q: string;
}

// Admin

export interface ListRegistrationApplications {
  unread_only?: boolean;
  page?: number;
  limit?: number;
}

export interface ApproveRegistrationApplication {
  id: number;
  approve: boolean;
  deny_reason?: string;
}

export interface AddAdmin {
  person_id: number;
  added: boolean;
}

export interface PurgePerson {
  person_id: number;
  reason?: string;
}

export interface PurgeCommunity {
  community_id: number;
  reason?: string;
}

export interface PurgePost {
  post_id: number;
  reason?: string;
}

export interface PurgeComment {
  comment_id: number;
  reason?: string;
}

// User

export interface Login {
  username_or_email: string;
  password: string;
  totp_2fa_token?: string;
}

export interface Register {
  username: string;
  password: string;
  password_verify: string;
  show_nsfw?: boolean;
  email?: string;
  captcha_uuid?: string;
  captcha_answer?: string;
  honeypot?: string;
  answer?: string;
}

export interface GetPersonDetails {
  person_id?: number;
  username?: string;
  sort?: SortType;
  page?: number;
  limit?: number;
  community_id?: number;
  saved_only?: boolean;
}

export interface GetPersonMentions {
  sort?: CommentSortType;
  page?: number;
  limit?: number;
  unread_only?: boolean;
}

export interface MarkPersonMentionAsRead {
  person_mention_id: number;
  read: boolean;
}

export interface GetReplies {
  sort?: CommentSortType;
  page?: number;
  limit?: number;
  unread_only?: boolean;
}

export interface MarkCommentReplyAsRead {
  comment_reply_id: number;
  read: boolean;
}

export interface BanPerson {
  person_id: number;
  ban: boolean;
  remove_data?: boolean;
  reason?: string;
  /** Unix timestamp in seconds. */
  expires?: number;
}

export interface BlockPerson {
  person_id: number;
  block: boolean;
}

export interface DeleteAccount {
  password: string;
  delete_content: boolean;
}

export interface PasswordReset {
  email: string;
}

export interface PasswordChangeAfterReset {
  token: string;
  password: string;
  password_verify: string;
}

export interface ChangePassword {
  new_password: string;
  new_password_verify: string;
  old_password: string;
}

export interface SaveUserSettings {
  show_nsfw?: boolean;
  blur_nsfw?: boolean;
  auto_expand?: boolean;
  theme?: string;
  default_sort_type?: SortType;
  default_listing_type?: ListingType;
  interface_language?: string;
  avatar?: string;
  banner?: string;
  display_name?: string;
  email?: string;
  bio?: string;
  matrix_user_id?: string;
  show_avatars?: boolean;
  send_notifications_to_email?: boolean;
  bot_account?: boolean;
  show_bot_accounts?: boolean;
  show_read_posts?: boolean;
  discussion_languages?: number[];
  open_links_in_new_tab?: boolean;
  infinite_scroll_enabled?: boolean;
  post_listing_mode?: PostListingMode;
  enable_keyboard_navigation?: boolean;
  enable_animated_images?: boolean;
  collapse_bot_comments?: boolean;
  show_scores?: boolean;
  show_upvotes?: boolean;
  show_downvotes?: boolean;
  show_upvote_percentage?: boolean;
}

export interface GetReportCount {
  community_id?: number;
}

export interface VerifyEmail {
  token: string;
}

export interface UpdateTotp {
  totp_token: string;
  enabled: boolean;
}

// Community

export interface GetCommunity {
  id?: number;
  /** Either `name` or `name@instance`. */
  name?: string;
}

export interface CreateCommunity {
  name: string;
  title: string;
  description?: string;
  icon?: string;
  banner?: string;
  nsfw?: boolean;
  posting_restricted_to_mods?: boolean;
  discussion_languages?: number[];
  visibility?: CommunityVisibility;
}

export interface EditCommunity {
  community_id: number;
  title?: string;
  description?: string;
  icon?: string;
  banner?: string;
  nsfw?: boolean;
  posting_restricted_to_mods?: boolean;
  discussion_languages?: number[];
  visibility?: CommunityVisibility;
}

export interface ListCommunities {
  type_?: ListingType;
  sort?: SortType;
  show_nsfw?: boolean;
  page?: number;
  limit?: number;
}

export interface FollowCommunity {
  community_id: number;
  follow: boolean;
}

export interface BlockCommunity {
  community_id: number;
  block: boolean;
}

export interface DeleteCommunity {
  community_id: number;
  deleted: boolean;
}

export interface RemoveCommunity {
  community_id: number;
  removed: boolean;
  reason?: string;
}

export interface TransferCommunity {
  community_id: number;
  person_id: number;
}

export interface BanFromCommunity {
  community_id: number;
  person_id: number;
  ban: boolean;
  remove_data?: boolean;
  reason?: string;
  expires?: number;
}

export interface AddModToCommunity {
  community_id: number;
  person_id: number;
  added: boolean;
}

export interface HideCommunity {
  community_id: number;
  hidden: boolean;
  reason?: string;
}

// Post

export interface GetPost {
  id?: number;
  comment_id?: number;
}

export interface CreatePost {
  name: string;
  community_id: number;
  url?: string;
  body?: string;
  alt_text?: string;
  honeypot?: string;
  nsfw?: boolean;
  language_id?: number;
  custom_thumbnail?: string;
}

export interface EditPost {
  post_id: number;
  name?: string;
  url?: string;
  body?: string;
  alt_text?: string;
  nsfw?: boolean;
  language_id?: number;
  custom_thumbnail?: string;
}

export interface DeletePost {
  post_id: number;
  deleted: boolean;
}

export interface RemovePost {
  post_id: number;
  removed: boolean;
  reason?: string;
}

export interface MarkPostAsRead {
  post_ids: number[];
  read: boolean;
}

export interface HidePost {
  post_ids: number[];
  hide: boolean;
}

export interface LockPost {
  post_id: number;
  locked: boolean;
}

export interface FeaturePost {
  post_id: number;
  featured: boolean;
  feature_type: PostFeatureType;
}

export interface GetPosts {
  type_?: ListingType;
  sort?: SortType;
  page?: number;
  limit?: number;
  community_id?: number;
  community_name?: string;
  saved_only?: boolean;
  liked_only?: boolean;
  disliked_only?: boolean;
  show_hidden?: boolean;
  show_read?: boolean;
  show_nsfw?: boolean;
  /** Cursor returned as `next_page` by the previous call. */
  page_cursor?: string;
}

export interface CreatePostLike {
  post_id: number;
  /** 1, 0 or -1. */
  score: number;
}

export interface ListPostLikes {
  post_id: number;
  page?: number;
  limit?: number;
}

export interface SavePost {
  post_id: number;
  save: boolean;
}

export interface CreatePostReport {
  post_id: number;
  reason: string;
}

export interface ResolvePostReport {
  report_id: number;
  resolved: boolean;
}

export interface ListPostReports {
  page?: number;
  limit?: number;
  unresolved_only?: boolean;
  community_id?: number;
  post_id?: number;
}

export interface GetSiteMetadata {
  url: string;
}

// Comment

export interface GetComment {
  id: number;
}

export interface CreateComment {
  content: string;
  post_id: number;
  parent_id?: number;
  language_id?: number;
}

export interface EditComment {
  comment_id: number;
  content?: string;
  language_id?: number;
}

export interface DeleteComment {
  comment_id: number;
  deleted: boolean;
}

export interface RemoveComment {
  comment_id: number;
  removed: boolean;
  reason?: string;
}

export interface CreateCommentLike {
  comment_id: number;
  score: number;
}

export interface ListCommentLikes {
  comment_id: number;
  page?: number;
  limit?: number;
}

export interface SaveComment {
  comment_id: number;
  save: boolean;
}

export interface DistinguishComment {
  comment_id: number;
  distinguished: boolean;
}

export interface GetComments {
  type_?: ListingType;
  sort?: CommentSortType;
  max_depth?: number;
  page?: number;
  limit?: number;
  community_id?: number;
  community_name?: string;
  post_id?: number;
  parent_id?: number;
  saved_only?: boolean;
  liked_only?: boolean;
  disliked_only?: boolean;
}

export interface CreateCommentReport {
  comment_id: number;
  reason: string;
}

export interface ResolveCommentReport {
  report_id: number;
  resolved: boolean;
}

export interface ListCommentReports {
  comment_id?: number;
  page?: number;
  limit?: number;
  unresolved_only?: boolean;
  community_id?: number;
}

// Private message

export interface GetPrivateMessages {
  unread_only?: boolean;
  page?: number;
  limit?: number;
  creator_id?: number;
}

export interface CreatePrivateMessage {
  content: string;
  recipient_id: number;
}

export interface EditPrivateMessage {
  private_message_id: number;
  content: string;
}

export interface DeletePrivateMessage {
  private_message_id: number;
  deleted: boolean;
}

export interface MarkPrivateMessageAsRead {
  private_message_id: number;
  read: boolean;
}

export interface CreatePrivateMessageReport {
  private_message_id: number;
  reason: string;
}

export interface ResolvePrivateMessageReport {
  report_id: number;
  resolved: boolean;
}

export interface ListPrivateMessageReports {
  page?: number;
  limit?: number;
  unresolved_only?: boolean;
}

// Custom emoji

export interface CreateCustomEmoji {
  category: string;
  shortcode: string;
  image_url: string;
  alt_text: string;
  keywords: string[];
}

export interface EditCustomEmoji {
  id: number;
  category: string;
  image_url: string;
  alt_text: string;
  keywords: string[];
}

export interface DeleteCustomEmoji {
  id: number;
}
