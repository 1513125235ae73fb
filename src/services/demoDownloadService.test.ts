import fs from 'fs';
import os from 'os';
import path from 'path';
import { DemoDownloader } from './demoDownloadService';
import { stubAdapter, type StubRequest, type StubReply } from '../testing/axiosStub';

const MATCH = { matchId: 12n, outcomeId: 34n, tokenId: 5 };
const FILE_NAME = '000000000000000000012_0000000034.dem.bz2';

describe('DemoDownloader', () => {
    let download_dir: string;

    beforeEach(() => {
        download_dir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'match-sync-demos-')), 'demos');
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
        fs.rmSync(path.dirname(download_dir), { recursive: true, force: true });
    });

    function downloader(reply: StubReply, requests: StubRequest[] = []) {
        return new DemoDownloader(download_dir, { adapter: stubAdapter(() => reply, requests) });
    }

    it('saves the demo under the download directory', async () => {
        const requests: StubRequest[] = [];

        const saved = await downloader({ status: 200, data: Buffer.from('demo-bytes') }, requests)
            .download(MATCH, { replayServer: 183 });

        expect(saved).toBe(path.join(download_dir, FILE_NAME));
        expect(fs.readFileSync(path.join(download_dir, FILE_NAME), 'utf8')).toBe('demo-bytes');
        expect(requests.map(request => request.url)).toEqual([`http://replay183.valve.net/730/${FILE_NAME}`]);
    });

    it('reuses an existing file unless forced', async () => {
        fs.mkdirSync(download_dir, { recursive: true });
        fs.writeFileSync(path.join(download_dir, FILE_NAME), 'old');
        const requests: StubRequest[] = [];
        const client = downloader({ status: 200, data: Buffer.from('new') }, requests);

        await client.download(MATCH);
        expect(requests).toHaveLength(0);

        await client.download(MATCH, { force: true });
        expect(requests).toHaveLength(1);
        expect(fs.readFileSync(path.join(download_dir, FILE_NAME), 'utf8')).toBe('new');
    });

    it('returns null when the replay server has no demo', async () => {
        await expect(downloader({ status: 404, data: null }).download(MATCH)).resolves.toBeNull();
        expect(fs.existsSync(path.join(download_dir, FILE_NAME))).toBe(false);
    });
});
