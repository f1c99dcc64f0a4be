export class LinksResponse {
  urls: string[];

  constructor(urls: string[] = []) {
    this.urls = urls;
  }
}
