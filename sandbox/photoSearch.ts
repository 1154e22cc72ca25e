import { ApiRequest, ApiResponse, isAbsent } from '../src';

class PhotoSearch extends ApiRequest {}
PhotoSearch.param('method')
  .param('api_key')
  .param('tags')
  .param('per_page', { type: 'integer' });

PhotoSearch.setTemplate('method', 'flickr.photos.search');
PhotoSearch.setTemplate('api_key', process.env.API_KEY || 'test-key');

class Photo extends ApiResponse {}
Photo.attribute('id', { type: 'integer' }).attribute('title').attribute('ispublic', { type: 'boolean' });

class PhotoList extends ApiResponse {
  successful(): boolean {
    return this.string('stat') === 'ok';
  }
}
PhotoList.attribute('stat', { required: true })
  .attribute('total', { type: 'integer', path: 'photos/total' })
  .collection('photos', Photo, { path: 'photos/photo' });

const request = new PhotoSearch({ tags: process.argv[2] || 'relax', per_page: 3 });
console.log(`Request URL: ${request.toUrl('http://api.flickr.com/services/rest/')}`);

const sample = `<?xml version="1.0" encoding="utf-8"?>
<rsp stat="ok">
  <photos page="1" total="2">
    <photo id="101" title="Beach" ispublic="1"/>
    <photo id="102" title="Hammock" ispublic="0"/>
  </photos>
</rsp>`;

const response = PhotoList.fromXml(sample);
console.log(`Successful: ${response.successful()}`);
for (const photo of response.collection('photos', Photo)) {
  const title = photo.string('title');
  console.log(`  #${String(photo.integer('id'))} ${isAbsent(title) ? '(untitled)' : title}`);
}
console.log(JSON.stringify(response.toObject(), null, 2));
