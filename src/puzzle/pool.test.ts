import { loadCharacterPools, parseCharacterPools } from './pool';

describe('character pools', () => {
    it('loads the shipped pools for every universe', () => {
        const pools = loadCharacterPools();
        expect(pools.marvel.map((c) => c.character)).toEqual(['Iron Man', 'Captain America', 'Spider-Man', 'Thor', 'Hulk']);
        expect(pools.dc).toHaveLength(5);
        expect(pools.image).toHaveLength(5);
        expect(pools.marvel[2]).toEqual({
            character: 'Spider-Man',
            aliases: ['Spidey', 'Peter Parker', 'Web-Slinger'],
            imageKey: 'marvel/spider-man.jpg',
        });
    });

    it('cleans whitespace and drops empty or repeated aliases', () => {
        const pools = parseCharacterPools({
            marvel: [{ character: '  Iron   Man ', aliases: ['Tony  Stark', '', 'Tony Stark', '  '], imageKey: 'marvel/iron-man.jpg' }],
            dc: [],
            image: [],
        });
        expect(pools.marvel[0]).toEqual({ character: 'Iron Man', aliases: ['Tony Stark'], imageKey: 'marvel/iron-man.jpg' });
    });

    it('defaults missing aliases to an empty list', () => {
        const pools = parseCharacterPools({
            marvel: [],
            dc: [{ character: 'Batman', imageKey: 'dc/batman.jpg' }],
            image: [],
        });
        expect(pools.dc[0].aliases).toEqual([]);
    });

    it('rejects an image key outside the universe folder', () => {
        expect(() =>
            parseCharacterPools({
                marvel: [{ character: 'Batman', aliases: [], imageKey: 'dc/batman.jpg' }],
                dc: [],
                image: [],
            }),
        ).toThrow("Invalid character pool at marvel.0: image key must start with 'marvel/'");
    });

    it('rejects an entry without a name', () => {
        expect(() =>
            parseCharacterPools({ marvel: [{ character: '   ', aliases: [], imageKey: 'marvel/x.jpg' }], dc: [], image: [] }),
        ).toThrow(/marvel\.0\.character/);
    });

    it('rejects a missing universe', () => {
        expect(() => parseCharacterPools({ marvel: [], dc: [] })).toThrow(/image/);
    });
});
