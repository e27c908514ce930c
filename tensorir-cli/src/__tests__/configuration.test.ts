import { resolve } from 'path';
import loadTensorIRProjectConfiguration, {
  fileSystemLoader_EXPOSED_FOR_TESTING,
  parseTensorIRProjectConfiguration,
} from '../configuration';

const FIXTURE_PROJECT = resolve(__dirname, '../../fixtures/project');

describe('tensorir-cli/configuration', () => {
  describe('parser', () => {
    it('Parser can parse good configurations', () => {
      expect(parseTensorIRProjectConfiguration('{}')).toEqual({
        sourceDirectory: '.',
        outputDirectory: 'out',
        rebuildCastOnChange: true,
      });

      expect(parseTensorIRProjectConfiguration('{"sourceDirectory": "source"}')).toEqual({
        sourceDirectory: 'source',
        outputDirectory: 'out',
        rebuildCastOnChange: true,
      });

      expect(
        parseTensorIRProjectConfiguration(`{
          "sourceDirectory": "source",
          "outputDirectory": "output",
          "rebuildCastOnChange": false
        }
        `)
      ).toEqual({
        sourceDirectory: 'source',
        outputDirectory: 'output',
        rebuildCastOnChange: false,
      });
    });

    it('Parser can reject bad configurations', () => {
      expect(parseTensorIRProjectConfiguration('')).toBeNull();
      expect(parseTensorIRProjectConfiguration('null')).toBeNull();
      expect(parseTensorIRProjectConfiguration('1')).toBeNull();
      expect(parseTensorIRProjectConfiguration('[]')).toBeNull();
      expect(parseTensorIRProjectConfiguration('"undefined"')).toBeNull();
      expect(parseTensorIRProjectConfiguration('{')).toBeNull();
      expect(parseTensorIRProjectConfiguration('{ "sourceDirectory": 3 }')).toBeNull();
      expect(parseTensorIRProjectConfiguration('{ "outputDirectory": null }')).toBeNull();
      expect(parseTensorIRProjectConfiguration('{ "rebuildCastOnChange": "no" }')).toBeNull();
    });
  });

  describe('loader', () => {
    it('When there is no configuration, say so.', () => {
      expect(
        loadTensorIRProjectConfiguration({
          startPath: '/home/test',
          pathExistanceTester() {
            return false;
          },
          fileReader() {
            return null;
          },
        })
      ).toBe('NO_CONFIGURATION');
    });

    it('When the configuration file is unreadable, say so.', () => {
      expect(
        loadTensorIRProjectConfiguration({
          startPath: '/home/test',
          pathExistanceTester() {
            return true;
          },
          fileReader() {
            return null;
          },
        })
      ).toBe('UNREADABLE_CONFIGURATION_FILE');
    });

    it('When the configuration file is unparsable, say so.', () => {
      expect(
        loadTensorIRProjectConfiguration({
          startPath: '/home/test',
          pathExistanceTester() {
            return true;
          },
          fileReader() {
            return 'bad file haha';
          },
        })
      ).toBe('UNPARSABLE_CONFIGURATION_FILE');
    });

    it('Directories are resolved against the closest configuration file.', () => {
      expect(
        loadTensorIRProjectConfiguration({
          startPath: '/home/test/kernels',
          pathExistanceTester(p) {
            return p === '/home/tirconfig.json';
          },
          fileReader() {
            return '{"outputDirectory": "build"}';
          },
        })
      ).toEqual({
        sourceDirectory: '/home',
        outputDirectory: '/home/build',
        rebuildCastOnChange: true,
      });
    });

    it('Real filesystem integration test.', () => {
      expect(
        loadTensorIRProjectConfiguration({
          ...fileSystemLoader_EXPOSED_FOR_TESTING,
          startPath: resolve(FIXTURE_PROJECT, 'src/nested'),
        })
      ).toEqual({
        sourceDirectory: resolve(FIXTURE_PROJECT, 'src'),
        outputDirectory: resolve(FIXTURE_PROJECT, 'folded'),
        rebuildCastOnChange: false,
      });
    });

    it('Real filesystem bad start path integration test.', () => {
      expect(
        loadTensorIRProjectConfiguration({
          ...fileSystemLoader_EXPOSED_FOR_TESTING,
          startPath: '/',
        })
      ).toBe('NO_CONFIGURATION');
    });
  });
});
