import type { EndpointDefinitions } from '../core/types.js';
import {
  addAdminResponseSchema,
  addModToCommunityResponseSchema,
  banFromCommunityResponseSchema,
  bannedPersonsResponseSchema,
  banPersonResponseSchema,
  blockCommunityResponseSchema,
  blockInstanceResponseSchema,
  blockPersonResponseSchema,
  commentReplyResponseSchema,
  commentReportResponseSchema,
  commentResponseSchema,
  communityResponseSchema,
  customEmojiResponseSchema,
  generateTotpSecretResponseSchema,
  getCaptchaResponseSchema,
  getCommentsResponseSchema,
  getCommunityResponseSchema,
  getFederatedInstancesResponseSchema,
  getModlogResponseSchema,
  getPersonDetailsResponseSchema,
  getPersonMentionsResponseSchema,
  getPostResponseSchema,
  getPostsResponseSchema,
  getRepliesResponseSchema,
  getReportCountResponseSchema,
  getSiteMetadataResponseSchema,
  getSiteResponseSchema,
  getUnreadCountResponseSchema,
  getUnreadRegistrationApplicationCountResponseSchema,
  listCommentLikesResponseSchema,
  listCommentReportsResponseSchema,
  listCommunitiesResponseSchema,
  listLoginsResponseSchema,
  listPostLikesResponseSchema,
  listPostReportsResponseSchema,
  listPrivateMessageReportsResponseSchema,
  listRegistrationApplicationsResponseSchema,
  loginResponseSchema,
  personMentionResponseSchema,
  postReportResponseSchema,
  postResponseSchema,
  privateMessageReportResponseSchema,
  privateMessageResponseSchema,
  privateMessagesResponseSchema,
  registrationApplicationResponseSchema,
  resolveObjectResponseSchema,
  searchResponseSchema,
  siteResponseSchema,
  successResponseSchema,
  updateTotpResponseSchema,
} from './responses.js';

/**
 * Every Lemmy v3 endpoint the client wraps, keyed by path relative to `/api/v3/`,
 * then by method, naming the schema a successful body decodes with.
 */
export interface LemmyEndpoints {
  site: {
    get: { response: typeof getSiteResponseSchema };
    post: { response: typeof siteResponseSchema };
    put: { response: typeof siteResponseSchema };
  };
  'site/block': {
    post: { response: typeof blockInstanceResponseSchema };
  };
  modlog: {
    get: { response: typeof getModlogResponseSchema };
  };
  search: {
    get: { response: typeof searchResponseSchema };
  };
  resolve_object: {
    get: { response: typeof resolveObjectResponseSchema };
  };
  federated_instances: {
    get: { response: typeof getFederatedInstancesResponseSchema };
  };

  'admin/leave': {
    post: { response: typeof getSiteResponseSchema };
  };
  'admin/registration_application/list': {
    get: { response: typeof listRegistrationApplicationsResponseSchema };
  };
  'admin/registration_application/count': {
    get: { response: typeof getUnreadRegistrationApplicationCountResponseSchema };
  };
  'admin/registration_application/approve': {
    put: { response: typeof registrationApplicationResponseSchema };
  };
  'admin/add': {
    post: { response: typeof addAdminResponseSchema };
  };
  'admin/purge/person': {
    post: { response: typeof successResponseSchema };
  };
  'admin/purge/community': {
    post: { response: typeof successResponseSchema };
  };
  'admin/purge/post': {
    post: { response: typeof successResponseSchema };
  };
  'admin/purge/comment': {
    post: { response: typeof successResponseSchema };
  };

  user: {
    get: { response: typeof getPersonDetailsResponseSchema };
  };
  'user/get_captcha': {
    get: { response: typeof getCaptchaResponseSchema };
  };
  'user/login': {
    post: { response: typeof loginResponseSchema };
  };
  'user/register': {
    post: { response: typeof loginResponseSchema };
  };
  'user/logout': {
    post: { response: typeof successResponseSchema };
  };
  'user/mention': {
    get: { response: typeof getPersonMentionsResponseSchema };
  };
  'user/mention/mark_as_read': {
    post: { response: typeof personMentionResponseSchema };
  };
  'user/replies': {
    get: { response: typeof getRepliesResponseSchema };
  };
  'user/ban': {
    post: { response: typeof banPersonResponseSchema };
  };
  'user/banned': {
    get: { response: typeof bannedPersonsResponseSchema };
  };
  'user/block': {
    post: { response: typeof blockPersonResponseSchema };
  };
  'user/delete_account': {
    post: { response: typeof successResponseSchema };
  };
  'user/password_reset': {
    post: { response: typeof successResponseSchema };
  };
  'user/password_change': {
    post: { response: typeof successResponseSchema };
  };
  'user/mark_all_as_read': {
    post: { response: typeof getRepliesResponseSchema };
  };
  'user/save_user_settings': {
    put: { response: typeof successResponseSchema };
  };
  'user/change_password': {
    put: { response: typeof loginResponseSchema };
  };
  'user/report_count': {
    get: { response: typeof getReportCountResponseSchema };
  };
  'user/unread_count': {
    get: { response: typeof getUnreadCountResponseSchema };
  };
  'user/verify_email': {
    post: { response: typeof successResponseSchema };
  };
  'user/totp/generate': {
    post: { response: typeof generateTotpSecretResponseSchema };
  };
  'user/totp/update': {
    post: { response: typeof updateTotpResponseSchema };
  };
  'user/list_logins': {
    get: { response: typeof listLoginsResponseSchema };
  };
  'user/validate_auth': {
    get: { response: typeof successResponseSchema };
  };

  community: {
    get: { response: typeof getCommunityResponseSchema };
    post: { response: typeof communityResponseSchema };
    put: { response: typeof communityResponseSchema };
  };
  'community/list': {
    get: { response: typeof listCommunitiesResponseSchema };
  };
  'community/follow': {
    post: { response: typeof communityResponseSchema };
  };
  'community/block': {
    post: { response: typeof blockCommunityResponseSchema };
  };
  'community/delete': {
    post: { response: typeof communityResponseSchema };
  };
  'community/remove': {
    post: { response: typeof communityResponseSchema };
  };
  'community/transfer': {
    post: { response: typeof getCommunityResponseSchema };
  };
  'community/ban_user': {
    post: { response: typeof banFromCommunityResponseSchema };
  };
  'community/mod': {
    post: { response: typeof addModToCommunityResponseSchema };
  };
  'community/hide': {
    put: { response: typeof successResponseSchema };
  };

  post: {
    get: { response: typeof getPostResponseSchema };
    post: { response: typeof postResponseSchema };
    put: { response: typeof postResponseSchema };
  };
  'post/list': {
    get: { response: typeof getPostsResponseSchema };
  };
  'post/delete': {
    post: { response: typeof postResponseSchema };
  };
  'post/remove': {
    post: { response: typeof postResponseSchema };
  };
  'post/mark_as_read': {
    post: { response: typeof successResponseSchema };
  };
  'post/hide': {
    post: { response: typeof successResponseSchema };
  };
  'post/lock': {
    post: { response: typeof postResponseSchema };
  };
  'post/feature': {
    post: { response: typeof postResponseSchema };
  };
  'post/like': {
    post: { response: typeof postResponseSchema };
  };
  'post/like/list': {
    get: { response: typeof listPostLikesResponseSchema };
  };
  'post/save': {
    put: { response: typeof postResponseSchema };
  };
  'post/report': {
    post: { response: typeof postReportResponseSchema };
  };
  'post/report/resolve': {
    put: { response: typeof postReportResponseSchema };
  };
  'post/report/list': {
    get: { response: typeof listPostReportsResponseSchema };
  };
  'post/site_metadata': {
    get: { response: typeof getSiteMetadataResponseSchema };
  };

  comment: {
    get: { response: typeof commentResponseSchema };
    post: { response: typeof commentResponseSchema };
    put: { response: typeof commentResponseSchema };
  };
  'comment/list': {
    get: { response: typeof getCommentsResponseSchema };
  };
  'comment/delete': {
    post: { response: typeof commentResponseSchema };
  };
  'comment/remove': {
    post: { response: typeof commentResponseSchema };
  };
  'comment/mark_as_read': {
    post: { response: typeof commentReplyResponseSchema };
  };
  'comment/like': {
    post: { response: typeof commentResponseSchema };
  };
  'comment/like/list': {
    get: { response: typeof listCommentLikesResponseSchema };
  };
  'comment/save': {
    put: { response: typeof commentResponseSchema };
  };
  'comment/distinguish': {
    post: { response: typeof commentResponseSchema };
  };
  'comment/report': {
    post: { response: typeof commentReportResponseSchema };
  };
  'comment/report/resolve': {
    put: { response: typeof commentReportResponseSchema };
  };
  'comment/report/list': {
    get: { response: typeof listCommentReportsResponseSchema };
  };

  private_message: {
    post: { response: typeof privateMessageResponseSchema };
    put: { response: typeof privateMessageResponseSchema };
  };
  'private_message/list': {
    get: { response: typeof privateMessagesResponseSchema };
  };
  'private_message/delete': {
    post: { response: typeof privateMessageResponseSchema };
  };
  'private_message/mark_as_read': {
    post: { response: typeof privateMessageResponseSchema };
  };
  'private_message/report': {
    post: { response: typeof privateMessageReportResponseSchema };
  };
  'private_message/report/resolve': {
    put: { response: typeof privateMessageReportResponseSchema };
  };
  'private_message/report/list': {
    get: { response: typeof listPrivateMessageReportsResponseSchema };
  };

  custom_emoji: {
    post: { response: typeof customEmojiResponseSchema };
    put: { response: typeof customEmojiResponseSchema };
  };
  'custom_emoji/delete': {
    post: { response: typeof successResponseSchema };
  };
}

/** Response schemas of {@link LemmyEndpoints}. */
export const lemmyEndpoints: LemmyEndpoints = {
  site: {
    get: { response: getSiteResponseSchema },
    post: { response: siteResponseSchema },
    put: { response: siteResponseSchema },
  },
  'site/block': {
    post: { response: blockInstanceResponseSchema },
  },
  modlog: {
    get: { response: getModlogResponseSchema },
  },
  search: {
    get: { response: searchResponseSchema },
  },
  resolve_object: {
    get: { response: resolveObjectResponseSchema },
  },
  federated_instances: {
    get: { response: getFederatedInstancesResponseSchema },
  },

  'admin/leave': {
    post: { response: getSiteResponseSchema },
  },
  'admin/registration_application/list': {
    get: { response: listRegistrationApplicationsResponseSchema },
  },
  'admin/registration_application/count': {
    get: { response: getUnreadRegistrationApplicationCountResponseSchema },
  },
  'admin/registration_application/approve': {
    put: { response: registrationApplicationResponseSchema },
  },
  'admin/add': {
    post: { response: addAdminResponseSchema },
  },
  'admin/purge/person': {
    post: { response: successResponseSchema },
  },
  'admin/purge/community': {
    post: { response: successResponseSchema },
  },
  'admin/purge/post': {
    post: { response: successResponseSchema },
  },
  'admin/purge/comment': {
    post: { response: successResponseSchema },
  },

  user: {
    get: { response: getPersonDetailsResponseSchema },
  },
  'user/get_captcha': {
    get: { response: getCaptchaResponseSchema },
  },
  'user/login': {
    post: { response: loginResponseSchema },
  },
  'user/register': {
    post: { response: loginResponseSchema },
  },
  'user/logout': {
    post: { response: successResponseSchema },
  },
  'user/mention': {
    get: { response: getPersonMentionsResponseSchema },
  },
  'user/mention/mark_as_read': {
    post: { response: personMentionResponseSchema },
  },
  'user/replies': {
    get: { response: getRepliesResponseSchema },
  },
  'user/ban': {
    post: { response: banPersonResponseSchema },
  },
  'user/banned': {
    get: { response: bannedPersonsResponseSchema },
  },
  'user/block': {
    post: { response: blockPersonResponseSchema },
  },
  'user/delete_account': {
    post: { response: successResponseSchema },
  },
  'user/password_reset': {
    post: { response: successResponseSchema },
  },
  'user/password_change': {
    post: { response: successResponseSchema },
  },
  'user/mark_all_as_read': {
    post: { response: getRepliesResponseSchema },
  },
  'user/save_user_settings': {
    put: { response: successResponseSchema },
  },
  'user/change_password': {
    put: { response: loginResponseSchema },
  },
  'user/report_count': {
    get: { response: getReportCountResponseSchema },
  },
  'user/unread_count': {
    get: { response: getUnreadCountResponseSchema },
  },
  'user/verify_email': {
    post: { response: successResponseSchema },
  },
  'user/totp/generate': {
    post: { response: generateTotpSecretResponseSchema },
  },
  'user/totp/update': {
    post: { response: updateTotpResponseSchema },
  },
  'user/list_logins': {
    get: { response: listLoginsResponseSchema },
  },
  'user/validate_auth': {
    get: { response: successResponseSchema },
  },

  community: {
    get: { response: getCommunityResponseSchema },
    post: { response: communityResponseSchema },
    put: { response: communityResponseSchema },
  },
  'community/list': {
    get: { response: listCommunitiesResponseSchema },
  },
  'community/follow': {
    post: { response: communityResponseSchema },
  },
  'community/block': {
    post: { response: blockCommunityResponseSchema },
  },
  'community/delete': {
    post: { response: communityResponseSchema },
  },
  'community/remove': {
    post: { response: communityResponseSchema },
  },
  'community/transfer': {
    post: { response: getCommunityResponseSchema },
  },
  'community/ban_user': {
    post: { response: banFromCommunityResponseSchema },
  },
  'community/mod': {
    post: { response: addModToCommunityResponseSchema },
  },
  'community/hide': {
    put: { response: successResponseSchema },
  },

  post: {
    get: { response: getPostResponseSchema },
    post: { response: postResponseSchema },
    put: { response: postResponseSchema },
  },
  'post/list': {
    get: { response: getPostsResponseSchema },
  },
  'post/delete': {
    post: { response: postResponseSchema },
  },
  'post/remove': {
    post: { response: postResponseSchema },
  },
  'post/mark_as_read': {
    post: { response: successResponseSchema },
  },
  'post/hide': {
    post: { response: successResponseSchema },
  },
  'post/lock': {
    post: { response: postResponseSchema },
  },
  'post/feature': {
    post: { response: postResponseSchema },
  },
  'post/like': {
    post: { response: postResponseSchema },
  },
  'post/like/list': {
    get: { response: listPostLikesResponseSchema },
  },
  'post/save': {
    put: { response: postResponseSchema },
  },
  'post/report': {
    post: { response: postReportResponseSchema },
  },
  'post/report/resolve': {
    put: { response: postReportResponseSchema },
  },
  'post/report/list': {
    get: { response: listPostReportsResponseSchema },
  },
  'post/site_metadata': {
    get: { response: getSiteMetadataResponseSchema },
  },

  comment: {
    get: { response: commentResponseSchema },
    post: { response: commentResponseSchema },
    put: { response: commentResponseSchema },
  },
  'comment/list': {
    get: { response: getCommentsResponseSchema },
  },
  'comment/delete': {
    post: { response: commentResponseSchema },
  },
  'comment/remove': {
    post: { response: commentResponseSchema },
  },
  'comment/mark_as_read': {
    post: { response: commentReplyResponseSchema },
  },
  'comment/like': {
    post: { response: commentResponseSchema },
  },
  'comment/like/list': {
    get: { response: listCommentLikesResponseSchema },
  },
  'comment/save': {
    put: { response: commentResponseSchema },
  },
  'comment/distinguish': {
    post: { response: commentResponseSchema },
  },
  'comment/report': {
    post: { response: commentReportResponseSchema },
  },
  'comment/report/resolve': {
    put: { response: commentReportResponseSchema },
  },
  'comment/report/list': {
    get: { response: listCommentReportsResponseSchema },
  },

  private_message: {
    post: { response: privateMessageResponseSchema },
    put: { response: privateMessageResponseSchema },
  },
  'private_message/list': {
    get: { response: privateMessagesResponseSchema },
  },
  'private_message/delete': {
    post: { response: privateMessageResponseSchema },
  },
  'private_message/mark_as_read': {
    post: { response: privateMessageResponseSchema },
  },
  'private_message/report': {
    post: { response: privateMessageReportResponseSchema },
  },
  'private_message/report/resolve': {
    put: { response: privateMessageReportResponseSchema },
  },
  'private_message/report/list': {
    get: { response: listPrivateMessageReportsResponseSchema },
  },

  custom_emoji: {
    post: { response: customEmojiResponseSchema },
    put: { response: customEmojiResponseSchema },
  },
  'custom_emoji/delete': {
    post: { response: successResponseSchema },
  },
} satisfies EndpointDefinitions;
