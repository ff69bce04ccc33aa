import { z } from 'zod';

export const sortTypeSchema = z.enum([
  'Active',
  'Hot',
  'New',
  'Old',
  'TopDay',
  'TopWeek',
  'TopMonth',
  'TopYear',
  'TopAll',
  'MostComments',
  'NewComments',
  'TopHour',
  'TopSixHour',
  'TopTwelveHour',
  'TopThreeMonths',
  'TopSixMonths',
  'TopNineMonths',
  'Controversial',
  'Scaled',
]);
export type SortType = z.infer<typeof sortTypeSchema>;

export const commentSortTypeSchema = z.enum(['Hot', 'Top', 'New', 'Old', 'Controversial']);
export type CommentSortType = z.infer<typeof commentSortTypeSchema>;

export const listingTypeSchema = z.enum(['All', 'Local', 'Subscribed', 'ModeratorView']);
export type ListingType = z.infer<typeof listingTypeSchema>;

export const subscribedTypeSchema = z.enum(['Subscribed', 'NotSubscribed', 'Pending']);
export type SubscribedType = z.infer<typeof subscribedTypeSchema>;

export const searchTypeSchema = z.enum(['All', 'Comments', 'Posts', 'Communities', 'Users', 'Url']);
export type SearchType = z.infer<typeof searchTypeSchema>;

export const registrationModeSchema = z.enum(['Closed', 'RequireApplication', 'Open']);
export type RegistrationMode = z.infer<typeof registrationModeSchema>;

export const postListingModeSchema = z.enum(['List', 'Card', 'SmallCard']);
export type PostListingMode = z.infer<typeof postListingModeSchema>;

export const postFeatureTypeSchema = z.enum(['Local', 'Community']);
export type PostFeatureType = z.infer<typeof postFeatureTypeSchema>;

export const communityVisibilitySchema = z.enum(['Public', 'LocalOnly']);
export type CommunityVisibility = z.infer<typeof communityVisibilitySchema>;

export const modlogActionTypeSchema = z.enum([
  'All',
  'ModRemovePost',
  'ModLockPost',
  'ModFeaturePost',
  'ModRemoveComment',
  'ModRemoveCommunity',
  'ModBanFromCommunity',
  'ModAddCommunity',
  'ModTransferCommunity',
  'ModAdd',
  'ModBan',
  'ModHideCommunity',
  'AdminPurgePerson',
  'AdminPurgeCommunity',
  'AdminPurgePost',
  'AdminPurgeComment',
]);
export type ModlogActionType = z.infer<typeof modlogActionTypeSchema>;
