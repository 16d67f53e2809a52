import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '@common/config/app.config';

const ABSOLUTE_URI = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * 상품 이미지 경로를 카탈로그 기준 URL로 조합한다.
 */
@Injectable()
export class CatalogUriComposer {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  composePictureUri(pictureUri: string): string {
    if (pictureUri.length === 0 || ABSOLUTE_URI.test(pictureUri)) {
      return pictureUri;
    }

    const base = this.config.catalogBaseUrl.replace(/\/+$/, '');
    const path = pictureUri.replace(/^\/+/, '');
    return `${base}/${path}`;
  }
}
