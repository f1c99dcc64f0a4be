import { Controller, Get, Query } from '@nestjs/common';
import { GetMediaQuery, GetPostsQuery } from './dto/get-media.query';
import { LinksResponse } from './dto/links.response';
import { MediaType } from './instagram.constants';
import { InstagramMediaService } from './instagram-media.service';

@Controller()
export class InstagramController {
  constructor(private readonly mediaService: InstagramMediaService) {}

  /**
   * Photo URLs from a user's posts
   * GET /getPhotos?username=<name>&max_count=<n>
   * 400 {"detail": ...} when the user does not exist
   */
  @Get('getPhotos')
  getPhotos(@Query() query: GetMediaQuery): Promise<LinksResponse> {
    return this.mediaService.getProfileMediaUrls(query.username, MediaType.Photo, query.max_count);
  }

  /**
   * Video URLs from a user's clip posts
   * GET /getVideos?username=<name>&max_count=<n>
   */
  @Get('getVideos')
  getVideos(@Query() query: GetMediaQuery): Promise<LinksResponse> {
    return this.mediaService.getProfileMediaUrls(query.username, MediaType.Clip, query.max_count);
  }

  /**
   * Post permalinks, optionally only those of one type
   * GET /getPosts?username=<name>[&max_count=<n>][&type=photo|clip|carousel]
   */
  @Get('getPosts')
  getPosts(@Query() query: GetPostsQuery): Promise<LinksResponse> {
    return this.mediaService.getProfilePostsUrls(query.username, query.max_count, query.type);
  }
}
