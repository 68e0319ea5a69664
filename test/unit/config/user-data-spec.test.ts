import { OverrideParseError } from '../../../src/common/errors';
import { MAX_SCRIPT_TIMEOUT_SECONDS, parseUserData } from '../../../src/config/UserDataSpec';

describe('parseUserData', () => {
  test('should treat a missing document as all defaults', () => {
    expect(parseUserData(undefined)).toEqual({});
    expect(parseUserData('   \n')).toEqual({});
  });

  test('should parse every recognised field', () => {
    const spec = parseUserData(JSON.stringify({
      scylla_yaml: { cluster_name: 'c1', seed_provider: [] },
      post_configuration_script: 'dG91Y2ggL3RtcC94Cg==',
      post_configuration_script_timeout: 30,
      start_scylla_on_first_boot: false
    }));

    expect(spec).toEqual({
      scylla_yaml: { cluster_name: 'c1', seed_provider: [] },
      post_configuration_script: 'dG91Y2ggL3RtcC94Cg==',
      post_configuration_script_timeout: 30,
      start_scylla_on_first_boot: false
    });
  });

  test('should drop unknown top-level keys', () => {
    expect(parseUserData('{"start_scylla_on_first_boot": true, "developer_mode": true}')).toEqual({
      start_scylla_on_first_boot: true
    });
  });

  test('should reject a body that is not JSON', () => {
    expect(() => parseUserData('#cloud-config\nruncmd: []')).toThrow(OverrideParseError);
  });

  test('should reject a JSON document that is not an object', () => {
    expect(() => parseUserData('[1, 2]')).toThrow('User data must be a JSON object');
    expect(() => parseUserData('"text"')).toThrow(OverrideParseError);
  });

  test('should reject fields of the wrong type', () => {
    expect(() => parseUserData('{"start_scylla_on_first_boot": "no"}')).toThrow(
      /Invalid user data: start_scylla_on_first_boot/
    );
    expect(() => parseUserData('{"scylla_yaml": ["a"]}')).toThrow(/scylla_yaml/);
  });

  test('should require a positive integer timeout', () => {
    expect(() => parseUserData('{"post_configuration_script_timeout": 2.5}')).toThrow(OverrideParseError);
    expect(() => parseUserData('{"post_configuration_script_timeout": 0}')).toThrow(OverrideParseError);
  });

  test('should cap the timeout at what a timer can hold', () => {
    expect(MAX_SCRIPT_TIMEOUT_SECONDS).toBe(2147483);
    expect(parseUserData('{"post_configuration_script_timeout": 2147483}')).toEqual({
      post_configuration_script_timeout: 2147483
    });
    expect(() => parseUserData('{"post_configuration_script_timeout": 3000000}')).toThrow(
      /Invalid user data: post_configuration_script_timeout/
    );
  });

  test('should carry the error code', () => {
    expect(() => parseUserData('{')).toThrow(expect.objectContaining({ code: 'OVERRIDE_PARSE' }));
  });
});
