import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { authenticateMember } from '../src/auth/member-authenticator';
import { parseCsv } from '../src/credentials';
import { parseMemberTable } from '../src/members/member-table';
import { EXIT_INVALID_INPUT, EXIT_OK, EXIT_USAGE, runHashPins } from './hash-pins';

const SALTED_482913 = '47b4c124f12bf25f57e892083f109340ba7e10bafd6eb09f9f04e67fe994c3da';
const SALTED_1234_TEST = 'f7782ad298d69ea2ad8185f0c86c0e643754d802618c50d3ca2af9ec17d1a769';

describe('hash-pins', () => {
    let dir: string;
    let infile: string;
    let outfile: string;
    let io: { log: jest.Mock; error: jest.Mock };

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'hash-pins-'));
        infile = join(dir, 'members.csv');
        outfile = join(dir, 'members-hashed.csv');
        io = { log: jest.fn(), error: jest.fn() };
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should replace PINs with salted hashes', async () => {
        await writeFile(infile, 'MemberID,Email,PIN,Notes\nM001,sam@example.com,482913,front desk\n');

        const code = await runHashPins(['--infile', infile, '--outfile', outfile, '--salt', 'dojo-salt'], {}, io);

        expect(code).toBe(EXIT_OK);
        expect(await readFile(outfile, 'utf8')).toBe(
            `MemberID,Email,PIN_Hash,Notes\nM001,sam@example.com,${SALTED_482913},front desk\n`,
        );
        expect(io.log).toHaveBeenCalledWith(`Wrote ${outfile} (1 members)`);
    });

    it('should take the salt from PIN_SALT when none is given', async () => {
        await writeFile(infile, 'MemberID,Email,PIN\nM002,alex@example.com,1234\n');

        await runHashPins(['--infile', infile, '--outfile', outfile], { PIN_SALT: 'test-salt' }, io);

        expect(await readFile(outfile, 'utf8')).toBe(`MemberID,Email,PIN_Hash\nM002,alex@example.com,${SALTED_1234_TEST}\n`);
    });

    it('should produce hashes the portal accepts at login', async () => {
        await writeFile(infile, [
            'MemberID,MemberName,Email,LeaveYear,AnnualAllowance,LeaveTaken,LeaveBalance,LastUpdated,PIN',
            'M001,Sam Rivera,sam@example.com,2026,4,1,3,2026-09-30,482913',
            '',
        ].join('\n'));

        await runHashPins(['--infile', infile, '--outfile', outfile, '--salt', 'dojo-salt'], {}, io);
        const roster = parseMemberTable(parseCsv(await readFile(outfile, 'utf8')));

        expect(authenticateMember(roster, 'sam@example.com', '482913', 'dojo-salt').ok).toBe(true);
        expect(authenticateMember(roster, 'sam@example.com', '482914', 'dojo-salt').ok).toBe(false);
    });

    it('should write nothing when a required column is missing', async () => {
        await writeFile(infile, 'MemberID,PIN\nM001,482913\n');

        const code = await runHashPins(['--infile', infile, '--outfile', outfile], {}, io);

        expect(code).toBe(EXIT_INVALID_INPUT);
        expect(io.error).toHaveBeenCalledWith('Members table is missing columns: Email');
        expect(existsSync(outfile)).toBe(false);
    });

    it('should list every invalid row', async () => {
        await writeFile(infile, 'MemberID,Email,PIN\nM001,,482913\nM002,alex@example.com,\n');

        const code = await runHashPins(['--infile', infile, '--outfile', outfile], {}, io);

        expect(code).toBe(EXIT_INVALID_INPUT);
        expect(io.error).toHaveBeenCalledWith(
            'Members table has 2 invalid rows: row 2 (M001): Email is empty; row 3 (M002): PIN is empty',
        );
        expect(existsSync(outfile)).toBe(false);
    });

    it('should refuse input whose cells would be lost', async () => {
        await writeFile(infile, 'MemberID,Email,PIN,Notes,,Notes\nM001,sam@example.com,1234,first,extra,second\n');

        const code = await runHashPins(['--infile', infile, '--outfile', outfile], {}, io);

        expect(code).toBe(EXIT_INVALID_INPUT);
        expect(io.error).toHaveBeenCalledWith('Malformed CSV: column 5 has no header; duplicate column Notes');
        expect(existsSync(outfile)).toBe(false);
    });

    it('should fail when the input cannot be read', async () => {
        const code = await runHashPins(['--infile', join(dir, 'missing.csv'), '--outfile', outfile], {}, io);

        expect(code).toBe(EXIT_INVALID_INPUT);
        expect(io.error.mock.calls[0][0]).toMatch(/^Cannot read .*missing\.csv: /);
    });

    it('should exit with a usage error when an option is missing', async () => {
        const code = await runHashPins(['--infile', infile], {}, io);

        expect(code).toBe(EXIT_USAGE);
        expect(io.error).toHaveBeenCalledWith('Missing --outfile');
    });

    it('should exit with a usage error on unknown options', async () => {
        const code = await runHashPins(['--infile', infile, '--outfile', outfile, '--pepper', 'x'], {}, io);

        expect(code).toBe(EXIT_USAGE);
    });
});
