import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Logger } from 'winston';
import { FetchTransport } from '../fetch/client.js';
import { type LemmyEndpoints, lemmyEndpoints } from '../lemmy/endpoints.js';
import type {
  AddAdmin,
  AddModToCommunity,
  ApproveRegistrationApplication,
  BanFromCommunity,
  BanPerson,
  BlockCommunity,
  BlockInstance,
  BlockPerson,
  ChangePassword,
  CreateComment,
  CreateCommentLike,
  CreateCommentReport,
  CreateCommunity,
  CreateCustomEmoji,
  CreatePost,
  CreatePostLike,
  CreatePostReport,
  CreatePrivateMessage,
  CreatePrivateMessageReport,
  CreateSite,
  DeleteAccount,
  DeleteComment,
  DeleteCommunity,
  DeleteCustomEmoji,
  DeletePost,
  DeletePrivateMessage,
  DistinguishComment,
  EditComment,
  EditCommunity,
  EditCustomEmoji,
  EditPost,
  EditPrivateMessage,
  EditSite,
  EmptyForm,
  FeaturePost,
  FollowCommunity,
  GetComment,
  GetComments,
  GetCommunity,
  GetModlog,
  GetPersonDetails,
  GetPersonMentions,
  GetPost,
  GetPosts,
  GetPrivateMessages,
  GetReplies,
  GetReportCount,
  GetSiteMetadata,
  HideCommunity,
  HidePost,
  ListCommentLikes,
  ListCommentReports,
  ListCommunities,
  ListPostLikes,
  ListPostReports,
  ListPrivateMessageReports,
  ListRegistrationApplications,
  LockPost,
  Login,
  MarkCommentReplyAsRead,
  MarkPersonMentionAsRead,
  MarkPostAsRead,
  MarkPrivateMessageAsRead,
  PasswordChangeAfterReset,
  PasswordReset,
  PurgeComment,
  PurgeCommunity,
  PurgePerson,
  PurgePost,
  Register,
  RemoveComment,
  RemoveCommunity,
  RemovePost,
  ResolveCommentReport,
  ResolveObject,
  ResolvePostReport,
  ResolvePrivateMessageReport,
  SaveComment,
  SavePost,
  SaveUserSettings,
  Search,
  TransferCommunity,
  UpdateTotp,
  VerifyEmail,
} from '../lemmy/forms.js';
import type {
  AddAdminResponse,
  AddModToCommunityResponse,
  BanFromCommunityResponse,
  BanPersonResponse,
  BannedPersonsResponse,
  BlockCommunityResponse,
  BlockInstanceResponse,
  BlockPersonResponse,
  CommentReplyResponse,
  CommentReportResponse,
  CommentResponse,
  CommunityResponse,
  CustomEmojiResponse,
  GenerateTotpSecretResponse,
  GetCaptchaResponse,
  GetCommentsResponse,
  GetCommunityResponse,
  GetFederatedInstancesResponse,
  GetModlogResponse,
  GetPersonDetailsResponse,
  GetPersonMentionsResponse,
  GetPostResponse,
  GetPostsResponse,
  GetRepliesResponse,
  GetReportCountResponse,
  GetSiteMetadataResponse,
  GetSiteResponse,
  GetUnreadCountResponse,
  GetUnreadRegistrationApplicationCountResponse,
  ListCommentLikesResponse,
  ListCommentReportsResponse,
  ListCommunitiesResponse,
  ListLoginsResponse,
  ListPostLikesResponse,
  ListPostReportsResponse,
  ListPrivateMessageReportsResponse,
  ListRegistrationApplicationsResponse,
  LoginResponse,
  PersonMentionResponse,
  PostReportResponse,
  PostResponse,
  PrivateMessageReportResponse,
  PrivateMessageResponse,
  PrivateMessagesResponse,
  RegistrationApplicationResponse,
  ResolveObjectResponse,
  SearchResponse,
  SiteResponse,
  SuccessResponse,
  UpdateTotpResponse,
} from '../lemmy/responses.js';
import type { HeaderOptions, HttpMethod, TransportProviderDefinition } from '../types/request.js';
import { mergeHeaderOptions } from '../utils/headers.js';
import { createClientLogger } from '../utils/logger.js';
import { makeRequest } from './dispatch.js';
import type { ClientOptions, LemmyRequest, LemmyResult, SchemaType } from './types.js';

/** Configuration for constructing a {@link LemmyClient}, extends {@link ClientOptions}. */
export interface LemmyClientProps extends ClientOptions {
  /** Headers sent with every request, per-call headers override them. */
  headers?: HeaderOptions;
  /** Transport used for every request. Defaults to {@link FetchTransport}. */
  transport?: TransportProviderDefinition;
  /** Logger for request outcomes. Defaults to {@link createClientLogger}. */
  logger?: Logger;
}

/** Runtime configuration accepted by {@link LemmyClient.config}. */
export interface LemmyClientConfig {
  /** Headers merged into the defaults, `null` removes a default header. */
  headers?: HeaderOptions;
  /** New default token, `null` clears it. */
  jwt?: string | null;
}

/**
 * Client for the Lemmy v3 API with one method per endpoint.
 *
 * Every method sends one request and resolves to `[error, data]`:
 * - `[null, data]` with the decoded response,
 * - `[LemmyError, null]` when the instance rejected the request,
 * - `[OtherError, null]` for anything else (network, decoding).
 *
 * Calls read the options when they start, so concurrent calls are independent.
 *
 * @example
 * const client = new LemmyClient({ domain: 'lemmy.ml', secure: true });
 * const [err, res] = await client.login({ body: { username_or_email: 'alice', password: 'test-password' } });
 * if (!err && res.jwt) {
 *   client.setJwt(res.jwt);
 * }
 */
export class LemmyClient {
  /** Domain, scheme and default token. */
  #options: ClientOptions;
  /** Default headers applied to every request (merged with per-call headers). */
  #headers: Headers;
  /** Transport performing the requests. */
  #transport: TransportProviderDefinition;
  /** Logger handed to the dispatch core. */
  #logger: Logger;

  /**
   * Creates a client for one Lemmy instance.
   */
  constructor({ domain, secure, jwt, headers, transport = new FetchTransport(), logger }: LemmyClientProps) {
    this.#options = { domain, secure, jwt };
    this.#headers = mergeHeaderOptions({ Accept: 'application/json' }, headers);
    this.#transport = transport;
    this.#logger = logger ?? createClientLogger();
  }

  /** Snapshot of the current options. */
  get clientOptions(): Readonly<ClientOptions> {
    return Object.freeze({ ...this.#options });
  }

  /**
   * Sets the default token sent with every following request, `undefined` clears it.
   */
  setJwt(jwt?: string) {
    this.#options = { ...this.#options, jwt };
  }

  /**
   * Updates default headers and token at runtime.
   */
  config({ headers, jwt }: LemmyClientConfig) {
    if (headers) {
      this.#headers = mergeHeaderOptions(this.#headers, headers);
    }

    if (jwt !== undefined) {
      this.setJwt(jwt ?? undefined);
    }
  }

  /**
   * Releases resources held by the transport, e.g. pooled sockets.
   */
  dispose() {
    this.#transport.dispose?.();
  }

  /**
   * Sends one request through the dispatch core with the current options and default headers.
   */
  #call<Schema extends SchemaType, Form extends object>(
    method: HttpMethod,
    path: keyof LemmyEndpoints,
    response: Schema,
    request: LemmyRequest<Form>,
    headers?: HeaderOptions,
  ): LemmyResult<StandardSchemaV1.InferOutput<Schema>> {
    return makeRequest({
      transport: this.#transport,
      options: { ...this.#options },
      method,
      path,
      request,
      headers: mergeHeaderOptions(this.#headers, headers),
      response,
      logger: this.#logger,
    });
  }

  /** Gets the site and, with a token, the calling user. `GET /site` */
  getSite(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetSiteResponse> {
    return this.#call('get', 'site', lemmyEndpoints.site.get.response, request, headers);
  }

  /** Creates the site, only possible during setup. `POST /site` */
  createSite(request: LemmyRequest<CreateSite>, headers?: HeaderOptions): LemmyResult<SiteResponse> {
    return this.#call('post', 'site', lemmyEndpoints.site.post.response, request, headers);
  }

  /** Edits the site settings. `PUT /site` */
  editSite(request: LemmyRequest<EditSite>, headers?: HeaderOptions): LemmyResult<SiteResponse> {
    return this.#call('put', 'site', lemmyEndpoints.site.put.response, request, headers);
  }

  /** Blocks or unblocks an instance for the calling user. `POST /site/block` */
  blockInstance(request: LemmyRequest<BlockInstance>, headers?: HeaderOptions): LemmyResult<BlockInstanceResponse> {
    return this.#call('post', 'site/block', lemmyEndpoints['site/block'].post.response, request, headers);
  }

  /** Gets the moderation log. `GET /modlog` */
  getModlog(request: LemmyRequest<GetModlog> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetModlogResponse> {
    return this.#call('get', 'modlog', lemmyEndpoints.modlog.get.response, request, headers);
  }

  /** Searches posts, comments, communities and users. `GET /search` */
  search(request: LemmyRequest<Search>, headers?: HeaderOptions): LemmyResult<SearchResponse> {
    return this.#call('get', 'search', lemmyEndpoints.search.get.response, request, headers);
  }

  /** Fetches a remote object by URL or `!community@instance` and stores it locally. `GET /resolve_object` */
  resolveObject(request: LemmyRequest<ResolveObject>, headers?: HeaderOptions): LemmyResult<ResolveObjectResponse> {
    return this.#call('get', 'resolve_object', lemmyEndpoints.resolve_object.get.response, request, headers);
  }

  /** Lists linked, allowed and blocked instances. `GET /federated_instances` */
  getFederatedInstances(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetFederatedInstancesResponse> {
    return this.#call('get', 'federated_instances', lemmyEndpoints.federated_instances.get.response, request, headers);
  }

  /** Gives up admin rights. `POST /admin/leave` */
  leaveAdmin(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetSiteResponse> {
    return this.#call('post', 'admin/leave', lemmyEndpoints['admin/leave'].post.response, request, headers);
  }

  /** Lists registration applications. `GET /admin/registration_application/list` */
  listRegistrationApplications(request: LemmyRequest<ListRegistrationApplications> = { body: {} }, headers?: HeaderOptions): LemmyResult<ListRegistrationApplicationsResponse> {
    return this.#call('get', 'admin/registration_application/list', lemmyEndpoints['admin/registration_application/list'].get.response, request, headers);
  }

  /** Counts registration applications awaiting review. `GET /admin/registration_application/count` */
  getUnreadRegistrationApplicationCount(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetUnreadRegistrationApplicationCountResponse> {
    return this.#call('get', 'admin/registration_application/count', lemmyEndpoints['admin/registration_application/count'].get.response, request, headers);
  }

  /** Approves or denies a registration application. `PUT /admin/registration_application/approve` */
  approveRegistrationApplication(request: LemmyRequest<ApproveRegistrationApplication>, headers?: HeaderOptions): LemmyResult<RegistrationApplicationResponse> {
    return this.#call('put', 'admin/registration_application/approve', lemmyEndpoints['admin/registration_application/approve'].put.response, request, headers);
  }

  /** Adds or removes an admin. `POST /admin/add` */
  addAdmin(request: LemmyRequest<AddAdmin>, headers?: HeaderOptions): LemmyResult<AddAdminResponse> {
    return this.#call('post', 'admin/add', lemmyEndpoints['admin/add'].post.response, request, headers);
  }

  /** Deletes a person and everything they created. `POST /admin/purge/person` */
  purgePerson(request: LemmyRequest<PurgePerson>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'admin/purge/person', lemmyEndpoints['admin/purge/person'].post.response, request, headers);
  }

  /** Deletes a community and its content. `POST /admin/purge/community` */
  purgeCommunity(request: LemmyRequest<PurgeCommunity>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'admin/purge/community', lemmyEndpoints['admin/purge/community'].post.response, request, headers);
  }

  /** Deletes a post and its comments. `POST /admin/purge/post` */
  purgePost(request: LemmyRequest<PurgePost>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'admin/purge/post', lemmyEndpoints['admin/purge/post'].post.response, request, headers);
  }

  /** Deletes a comment. `POST /admin/purge/comment` */
  purgeComment(request: LemmyRequest<PurgeComment>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'admin/purge/comment', lemmyEndpoints['admin/purge/comment'].post.response, request, headers);
  }

  /** Gets a person with their posts, comments and moderated communities. `GET /user` */
  getPersonDetails(request: LemmyRequest<GetPersonDetails> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetPersonDetailsResponse> {
    return this.#call('get', 'user', lemmyEndpoints.user.get.response, request, headers);
  }

  /** Gets a captcha for registration. `GET /user/get_captcha` */
  getCaptcha(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetCaptchaResponse> {
    return this.#call('get', 'user/get_captcha', lemmyEndpoints['user/get_captcha'].get.response, request, headers);
  }

  /** Logs in, the returned `jwt` is not stored on the client. `POST /user/login` */
  login(request: LemmyRequest<Login>, headers?: HeaderOptions): LemmyResult<LoginResponse> {
    return this.#call('post', 'user/login', lemmyEndpoints['user/login'].post.response, request, headers);
  }

  /** Registers a new account. `POST /user/register` */
  register(request: LemmyRequest<Register>, headers?: HeaderOptions): LemmyResult<LoginResponse> {
    return this.#call('post', 'user/register', lemmyEndpoints['user/register'].post.response, request, headers);
  }

  /** Invalidates the current token. `POST /user/logout` */
  logout(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'user/logout', lemmyEndpoints['user/logout'].post.response, request, headers);
  }

  /** Lists mentions of the calling user. `GET /user/mention` */
  getPersonMentions(request: LemmyRequest<GetPersonMentions> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetPersonMentionsResponse> {
    return this.#call('get', 'user/mention', lemmyEndpoints['user/mention'].get.response, request, headers);
  }

  /** Marks a mention as read or unread. `POST /user/mention/mark_as_read` */
  markPersonMentionAsRead(request: LemmyRequest<MarkPersonMentionAsRead>, headers?: HeaderOptions): LemmyResult<PersonMentionResponse> {
    return this.#call('post', 'user/mention/mark_as_read', lemmyEndpoints['user/mention/mark_as_read'].post.response, request, headers);
  }

  /** Lists replies to the calling user. `GET /user/replies` */
  getReplies(request: LemmyRequest<GetReplies> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetRepliesResponse> {
    return this.#call('get', 'user/replies', lemmyEndpoints['user/replies'].get.response, request, headers);
  }

  /** Marks a reply as read or unread. `POST /comment/mark_as_read` */
  markCommentReplyAsRead(request: LemmyRequest<MarkCommentReplyAsRead>, headers?: HeaderOptions): LemmyResult<CommentReplyResponse> {
    return this.#call('post', 'comment/mark_as_read', lemmyEndpoints['comment/mark_as_read'].post.response, request, headers);
  }

  /** Bans or unbans a person from the site. `POST /user/ban` */
  banPerson(request: LemmyRequest<BanPerson>, headers?: HeaderOptions): LemmyResult<BanPersonResponse> {
    return this.#call('post', 'user/ban', lemmyEndpoints['user/ban'].post.response, request, headers);
  }

  /** Lists people banned from the site. `GET /user/banned` */
  getBannedPersons(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<BannedPersonsResponse> {
    return this.#call('get', 'user/banned', lemmyEndpoints['user/banned'].get.response, request, headers);
  }

  /** Blocks or unblocks a person. `POST /user/block` */
  blockPerson(request: LemmyRequest<BlockPerson>, headers?: HeaderOptions): LemmyResult<BlockPersonResponse> {
    return this.#call('post', 'user/block', lemmyEndpoints['user/block'].post.response, request, headers);
  }

  /** Deletes the calling user's account. `POST /user/delete_account` */
  deleteAccount(request: LemmyRequest<DeleteAccount>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'user/delete_account', lemmyEndpoints['user/delete_account'].post.response, request, headers);
  }

  /** Sends a password reset email. `POST /user/password_reset` */
  passwordReset(request: LemmyRequest<PasswordReset>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'user/password_reset', lemmyEndpoints['user/password_reset'].post.response, request, headers);
  }

  /** Sets a new password with the token from a reset email. `POST /user/password_change` */
  passwordChangeAfterReset(request: LemmyRequest<PasswordChangeAfterReset>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'user/password_change', lemmyEndpoints['user/password_change'].post.response, request, headers);
  }

  /** Marks all replies, mentions and messages as read. `POST /user/mark_all_as_read` */
  markAllAsRead(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetRepliesResponse> {
    return this.#call('post', 'user/mark_all_as_read', lemmyEndpoints['user/mark_all_as_read'].post.response, request, headers);
  }

  /** Saves the calling user's settings. `PUT /user/save_user_settings` */
  saveUserSettings(request: LemmyRequest<SaveUserSettings> = { body: {} }, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('put', 'user/save_user_settings', lemmyEndpoints['user/save_user_settings'].put.response, request, headers);
  }

  /** Changes the password, returning a fresh token. `PUT /user/change_password` */
  changePassword(request: LemmyRequest<ChangePassword>, headers?: HeaderOptions): LemmyResult<LoginResponse> {
    return this.#call('put', 'user/change_password', lemmyEndpoints['user/change_password'].put.response, request, headers);
  }

  /** Counts open reports the calling user can resolve. `GET /user/report_count` */
  getReportCount(request: LemmyRequest<GetReportCount> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetReportCountResponse> {
    return this.#call('get', 'user/report_count', lemmyEndpoints['user/report_count'].get.response, request, headers);
  }

  /** Counts unread replies, mentions and messages. `GET /user/unread_count` */
  getUnreadCount(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetUnreadCountResponse> {
    return this.#call('get', 'user/unread_count', lemmyEndpoints['user/unread_count'].get.response, request, headers);
  }

  /** Verifies an email address with the emailed token. `POST /user/verify_email` */
  verifyEmail(request: LemmyRequest<VerifyEmail>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'user/verify_email', lemmyEndpoints['user/verify_email'].post.response, request, headers);
  }

  /** Generates a TOTP secret for two-factor login. `POST /user/totp/generate` */
  generateTotpSecret(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<GenerateTotpSecretResponse> {
    return this.#call('post', 'user/totp/generate', lemmyEndpoints['user/totp/generate'].post.response, request, headers);
  }

  /** Enables or disables two-factor login. `POST /user/totp/update` */
  updateTotp(request: LemmyRequest<UpdateTotp>, headers?: HeaderOptions): LemmyResult<UpdateTotpResponse> {
    return this.#call('post', 'user/totp/update', lemmyEndpoints['user/totp/update'].post.response, request, headers);
  }

  /** Lists active login tokens of the calling user. `GET /user/list_logins` */
  listLogins(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<ListLoginsResponse> {
    return this.#call('get', 'user/list_logins', lemmyEndpoints['user/list_logins'].get.response, request, headers);
  }

  /** Checks that the current token is valid. `GET /user/validate_auth` */
  validateAuth(request: LemmyRequest<EmptyForm> = { body: {} }, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('get', 'user/validate_auth', lemmyEndpoints['user/validate_auth'].get.response, request, headers);
  }

  /** Gets a community by id or name. `GET /community` */
  getCommunity(request: LemmyRequest<GetCommunity> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetCommunityResponse> {
    return this.#call('get', 'community', lemmyEndpoints.community.get.response, request, headers);
  }

  /** Creates a community. `POST /community` */
  createCommunity(request: LemmyRequest<CreateCommunity>, headers?: HeaderOptions): LemmyResult<CommunityResponse> {
    return this.#call('post', 'community', lemmyEndpoints.community.post.response, request, headers);
  }

  /** Edits a community. `PUT /community` */
  editCommunity(request: LemmyRequest<EditCommunity>, headers?: HeaderOptions): LemmyResult<CommunityResponse> {
    return this.#call('put', 'community', lemmyEndpoints.community.put.response, request, headers);
  }

  /** Lists communities. `GET /community/list` */
  listCommunities(request: LemmyRequest<ListCommunities> = { body: {} }, headers?: HeaderOptions): LemmyResult<ListCommunitiesResponse> {
    return this.#call('get', 'community/list', lemmyEndpoints['community/list'].get.response, request, headers);
  }

  /** Follows or unfollows a community. `POST /community/follow` */
  followCommunity(request: LemmyRequest<FollowCommunity>, headers?: HeaderOptions): LemmyResult<CommunityResponse> {
    return this.#call('post', 'community/follow', lemmyEndpoints['community/follow'].post.response, request, headers);
  }

  /** Blocks or unblocks a community. `POST /community/block` */
  blockCommunity(request: LemmyRequest<BlockCommunity>, headers?: HeaderOptions): LemmyResult<BlockCommunityResponse> {
    return this.#call('post', 'community/block', lemmyEndpoints['community/block'].post.response, request, headers);
  }

  /** Deletes or restores a community, as its creator. `POST /community/delete` */
  deleteCommunity(request: LemmyRequest<DeleteCommunity>, headers?: HeaderOptions): LemmyResult<CommunityResponse> {
    return this.#call('post', 'community/delete', lemmyEndpoints['community/delete'].post.response, request, headers);
  }

  /** Removes or restores a community, as an admin. `POST /community/remove` */
  removeCommunity(request: LemmyRequest<RemoveCommunity>, headers?: HeaderOptions): LemmyResult<CommunityResponse> {
    return this.#call('post', 'community/remove', lemmyEndpoints['community/remove'].post.response, request, headers);
  }

  /** Transfers a community to another moderator. `POST /community/transfer` */
  transferCommunity(request: LemmyRequest<TransferCommunity>, headers?: HeaderOptions): LemmyResult<GetCommunityResponse> {
    return this.#call('post', 'community/transfer', lemmyEndpoints['community/transfer'].post.response, request, headers);
  }

  /** Bans or unbans a person from a community. `POST /community/ban_user` */
  banFromCommunity(request: LemmyRequest<BanFromCommunity>, headers?: HeaderOptions): LemmyResult<BanFromCommunityResponse> {
    return this.#call('post', 'community/ban_user', lemmyEndpoints['community/ban_user'].post.response, request, headers);
  }

  /** Adds or removes a community moderator. `POST /community/mod` */
  addModToCommunity(request: LemmyRequest<AddModToCommunity>, headers?: HeaderOptions): LemmyResult<AddModToCommunityResponse> {
    return this.#call('post', 'community/mod', lemmyEndpoints['community/mod'].post.response, request, headers);
  }

  /** Hides or unhides a community from public listings. `PUT /community/hide` */
  hideCommunity(request: LemmyRequest<HideCommunity>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('put', 'community/hide', lemmyEndpoints['community/hide'].put.response, request, headers);
  }

  /** Gets a post by id, or the post of a comment. `GET /post` */
  getPost(request: LemmyRequest<GetPost> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetPostResponse> {
    return this.#call('get', 'post', lemmyEndpoints.post.get.response, request, headers);
  }

  /** Creates a post. `POST /post` */
  createPost(request: LemmyRequest<CreatePost>, headers?: HeaderOptions): LemmyResult<PostResponse> {
    return this.#call('post', 'post', lemmyEndpoints.post.post.response, request, headers);
  }

  /** Edits a post. `PUT /post` */
  editPost(request: LemmyRequest<EditPost>, headers?: HeaderOptions): LemmyResult<PostResponse> {
    return this.#call('put', 'post', lemmyEndpoints.post.put.response, request, headers);
  }

  /** Lists posts. `GET /post/list` */
  getPosts(request: LemmyRequest<GetPosts> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetPostsResponse> {
    return this.#call('get', 'post/list', lemmyEndpoints['post/list'].get.response, request, headers);
  }

  /** Deletes or restores a post, as its creator. `POST /post/delete` */
  deletePost(request: LemmyRequest<DeletePost>, headers?: HeaderOptions): LemmyResult<PostResponse> {
    return this.#call('post', 'post/delete', lemmyEndpoints['post/delete'].post.response, request, headers);
  }

  /** Removes or restores a post, as a moderator. `POST /post/remove` */
  removePost(request: LemmyRequest<RemovePost>, headers?: HeaderOptions): LemmyResult<PostResponse> {
    return this.#call('post', 'post/remove', lemmyEndpoints['post/remove'].post.response, request, headers);
  }

  /** Marks posts as read or unread. `POST /post/mark_as_read` */
  markPostAsRead(request: LemmyRequest<MarkPostAsRead>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'post/mark_as_read', lemmyEndpoints['post/mark_as_read'].post.response, request, headers);
  }

  /** Hides or unhides posts. `POST /post/hide` */
  hidePost(request: LemmyRequest<HidePost>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'post/hide', lemmyEndpoints['post/hide'].post.response, request, headers);
  }

  /** Locks or unlocks a post. `POST /post/lock` */
  lockPost(request: LemmyRequest<LockPost>, headers?: HeaderOptions): LemmyResult<PostResponse> {
    return this.#call('post', 'post/lock', lemmyEndpoints['post/lock'].post.response, request, headers);
  }

  /** Features or unfeatures a post. `POST /post/feature` */
  featurePost(request: LemmyRequest<FeaturePost>, headers?: HeaderOptions): LemmyResult<PostResponse> {
    return this.#call('post', 'post/feature', lemmyEndpoints['post/feature'].post.response, request, headers);
  }

  /** Votes on a post. `POST /post/like` */
  likePost(request: LemmyRequest<CreatePostLike>, headers?: HeaderOptions): LemmyResult<PostResponse> {
    return this.#call('post', 'post/like', lemmyEndpoints['post/like'].post.response, request, headers);
  }

  /** Lists votes on a post, as an admin. `GET /post/like/list` */
  listPostLikes(request: LemmyRequest<ListPostLikes>, headers?: HeaderOptions): LemmyResult<ListPostLikesResponse> {
    return this.#call('get', 'post/like/list', lemmyEndpoints['post/like/list'].get.response, request, headers);
  }

  /** Saves or unsaves a post. `PUT /post/save` */
  savePost(request: LemmyRequest<SavePost>, headers?: HeaderOptions): LemmyResult<PostResponse> {
    return this.#call('put', 'post/save', lemmyEndpoints['post/save'].put.response, request, headers);
  }

  /** Reports a post. `POST /post/report` */
  createPostReport(request: LemmyRequest<CreatePostReport>, headers?: HeaderOptions): LemmyResult<PostReportResponse> {
    return this.#call('post', 'post/report', lemmyEndpoints['post/report'].post.response, request, headers);
  }

  /** Resolves or reopens a post report. `PUT /post/report/resolve` */
  resolvePostReport(request: LemmyRequest<ResolvePostReport>, headers?: HeaderOptions): LemmyResult<PostReportResponse> {
    return this.#call('put', 'post/report/resolve', lemmyEndpoints['post/report/resolve'].put.response, request, headers);
  }

  /** Lists post reports. `GET /post/report/list` */
  listPostReports(request: LemmyRequest<ListPostReports> = { body: {} }, headers?: HeaderOptions): LemmyResult<ListPostReportsResponse> {
    return this.#call('get', 'post/report/list', lemmyEndpoints['post/report/list'].get.response, request, headers);
  }

  /** Fetches title and preview metadata of a URL. `GET /post/site_metadata` */
  getSiteMetadata(request: LemmyRequest<GetSiteMetadata>, headers?: HeaderOptions): LemmyResult<GetSiteMetadataResponse> {
    return this.#call('get', 'post/site_metadata', lemmyEndpoints['post/site_metadata'].get.response, request, headers);
  }

  /** Gets a comment. `GET /comment` */
  getComment(request: LemmyRequest<GetComment>, headers?: HeaderOptions): LemmyResult<CommentResponse> {
    return this.#call('get', 'comment', lemmyEndpoints.comment.get.response, request, headers);
  }

  /** Creates a comment. `POST /comment` */
  createComment(request: LemmyRequest<CreateComment>, headers?: HeaderOptions): LemmyResult<CommentResponse> {
    return this.#call('post', 'comment', lemmyEndpoints.comment.post.response, request, headers);
  }

  /** Edits a comment. `PUT /comment` */
  editComment(request: LemmyRequest<EditComment>, headers?: HeaderOptions): LemmyResult<CommentResponse> {
    return this.#call('put', 'comment', lemmyEndpoints.comment.put.response, request, headers);
  }

  /** Lists comments. `GET /comment/list` */
  getComments(request: LemmyRequest<GetComments> = { body: {} }, headers?: HeaderOptions): LemmyResult<GetCommentsResponse> {
    return this.#call('get', 'comment/list', lemmyEndpoints['comment/list'].get.response, request, headers);
  }

  /** Deletes or restores a comment, as its creator. `POST /comment/delete` */
  deleteComment(request: LemmyRequest<DeleteComment>, headers?: HeaderOptions): LemmyResult<CommentResponse> {
    return this.#call('post', 'comment/delete', lemmyEndpoints['comment/delete'].post.response, request, headers);
  }

  /** Removes or restores a comment, as a moderator. `POST /comment/remove` */
  removeComment(request: LemmyRequest<RemoveComment>, headers?: HeaderOptions): LemmyResult<CommentResponse> {
    return this.#call('post', 'comment/remove', lemmyEndpoints['comment/remove'].post.response, request, headers);
  }

  /** Votes on a comment. `POST /comment/like` */
  likeComment(request: LemmyRequest<CreateCommentLike>, headers?: HeaderOptions): LemmyResult<CommentResponse> {
    return this.#call('post', 'comment/like', lemmyEndpoints['comment/like'].post.response, request, headers);
  }

  /** Lists votes on a comment, as an admin. `GET /comment/like/list` */
  listCommentLikes(request: LemmyRequest<ListCommentLikes>, headers?: HeaderOptions): LemmyResult<ListCommentLikesResponse> {
    return this.#call('get', 'comment/like/list', lemmyEndpoints['comment/like/list'].get.response, request, headers);
  }

  /** Saves or unsaves a comment. `PUT /comment/save` */
  saveComment(request: LemmyRequest<SaveComment>, headers?: HeaderOptions): LemmyResult<CommentResponse> {
    return this.#call('put', 'comment/save', lemmyEndpoints['comment/save'].put.response, request, headers);
  }

  /** Distinguishes a comment as a moderator. `POST /comment/distinguish` */
  distinguishComment(request: LemmyRequest<DistinguishComment>, headers?: HeaderOptions): LemmyResult<CommentResponse> {
    return this.#call('post', 'comment/distinguish', lemmyEndpoints['comment/distinguish'].post.response, request, headers);
  }

  /** Reports a comment. `POST /comment/report` */
  createCommentReport(request: LemmyRequest<CreateCommentReport>, headers?: HeaderOptions): LemmyResult<CommentReportResponse> {
    return this.#call('post', 'comment/report', lemmyEndpoints['comment/report'].post.response, request, headers);
  }

  /** Resolves or reopens a comment report. `PUT /comment/report/resolve` */
  resolveCommentReport(request: LemmyRequest<ResolveCommentReport>, headers?: HeaderOptions): LemmyResult<CommentReportResponse> {
    return this.#call('put', 'comment/report/resolve', lemmyEndpoints['comment/report/resolve'].put.response, request, headers);
  }

  /** Lists comment reports. `GET /comment/report/list` */
  listCommentReports(request: LemmyRequest<ListCommentReports> = { body: {} }, headers?: HeaderOptions): LemmyResult<ListCommentReportsResponse> {
    return this.#call('get', 'comment/report/list', lemmyEndpoints['comment/report/list'].get.response, request, headers);
  }

  /** Lists private messages. `GET /private_message/list` */
  getPrivateMessages(request: LemmyRequest<GetPrivateMessages> = { body: {} }, headers?: HeaderOptions): LemmyResult<PrivateMessagesResponse> {
    return this.#call('get', 'private_message/list', lemmyEndpoints['private_message/list'].get.response, request, headers);
  }

  /** Sends a private message. `POST /private_message` */
  createPrivateMessage(request: LemmyRequest<CreatePrivateMessage>, headers?: HeaderOptions): LemmyResult<PrivateMessageResponse> {
    return this.#call('post', 'private_message', lemmyEndpoints.private_message.post.response, request, headers);
  }

  /** Edits a private message. `PUT /private_message` */
  editPrivateMessage(request: LemmyRequest<EditPrivateMessage>, headers?: HeaderOptions): LemmyResult<PrivateMessageResponse> {
    return this.#call('put', 'private_message', lemmyEndpoints.private_message.put.response, request, headers);
  }

  /** Deletes or restores a private message. `POST /private_message/delete` */
  deletePrivateMessage(request: LemmyRequest<DeletePrivateMessage>, headers?: HeaderOptions): LemmyResult<PrivateMessageResponse> {
    return this.#call('post', 'private_message/delete', lemmyEndpoints['private_message/delete'].post.response, request, headers);
  }

  /** Marks a private message as read or unread. `POST /private_message/mark_as_read` */
  markPrivateMessageAsRead(request: LemmyRequest<MarkPrivateMessageAsRead>, headers?: HeaderOptions): LemmyResult<PrivateMessageResponse> {
    return this.#call('post', 'private_message/mark_as_read', lemmyEndpoints['private_message/mark_as_read'].post.response, request, headers);
  }

  /** Reports a private message. `POST /private_message/report` */
  createPrivateMessageReport(request: LemmyRequest<CreatePrivateMessageReport>, headers?: HeaderOptions): LemmyResult<PrivateMessageReportResponse> {
    return this.#call('post', 'private_message/report', lemmyEndpoints['private_message/report'].post.response, request, headers);
  }

  /** Resolves or reopens a private message report. `PUT /private_message/report/resolve` */
  resolvePrivateMessageReport(request: LemmyRequest<ResolvePrivateMessageReport>, headers?: HeaderOptions): LemmyResult<PrivateMessageReportResponse> {
    return this.#call('put', 'private_message/report/resolve', lemmyEndpoints['private_message/report/resolve'].put.response, request, headers);
  }

  /** Lists private message reports, as an admin. `GET /private_message/report/list` */
  listPrivateMessageReports(request: LemmyRequest<ListPrivateMessageReports> = { body: {} }, headers?: HeaderOptions): LemmyResult<ListPrivateMessageReportsResponse> {
    return this.#call('get', 'private_message/report/list', lemmyEndpoints['private_message/report/list'].get.response, request, headers);
  }

  /** Creates a custom emoji. `POST /custom_emoji` */
  createCustomEmoji(request: LemmyRequest<CreateCustomEmoji>, headers?: HeaderOptions): LemmyResult<CustomEmojiResponse> {
    return this.#call('post', 'custom_emoji', lemmyEndpoints.custom_emoji.post.response, request, headers);
  }

  /** Edits a custom emoji. `PUT /custom_emoji` */
  editCustomEmoji(request: LemmyRequest<EditCustomEmoji>, headers?: HeaderOptions): LemmyResult<CustomEmojiResponse> {
    return this.#call('put', 'custom_emoji', lemmyEndpoints.custom_emoji.put.response, request, headers);
  }

  /** Deletes a custom emoji. `POST /custom_emoji/delete` */
  deleteCustomEmoji(request: LemmyRequest<DeleteCustomEmoji>, headers?: HeaderOptions): LemmyResult<SuccessResponse> {
    return this.#call('post', 'custom_emoji/delete', lemmyEndpoints['custom_emoji/delete'].post.response, request, headers);
  }
}
