import type { CompileOptions, HeaderstubConfig, StubTarget } from './configTypes.js';

export const DEFAULT_TARGETS: StubTarget[] = [
  {
    output: 'acconeer_a121_stubs.c',
    library: 'acconeer_a121',
    headers: [
      'acc_hal_definitions_a121.h',
      'acc_definitions_common.h',
      'acc_processing.h',
      'acc_sensor.h',
      'acc_config.h',
      'acc_config_subsweep.h',
      'acc_definitions_a121.h',
      'acc_version.h',
      'acc_rss_a121.h',
    ],
  },
  {
    output: 'acc_detector_distance_a121_stubs.c',
    library: 'acc_detector_distance_a121',
    feature: 'distance',
    headers: ['acc_detector_distance_definitions.h', 'acc_detector_distance.h'],
  },
  {
    output: 'acc_detector_presence_a121_stubs.c',
    library: 'acc_detector_presence_a121',
    feature: 'presence',
    headers: ['acc_detector_presence.h'],
  },
];

export const DEFAULT_RETURN_VALUES: Record<string, string> = {
  bool: 'true',
  uint8_t: '0',
  uint16_t: '0',
  uint32_t: '0',
  float: '0.1',
  int32_t: '-1',
  acc_config_profile_t: 'ACC_CONFIG_PROFILE_3',
  acc_config_idle_state_t: 'ACC_CONFIG_IDLE_STATE_SLEEP',
  acc_config_prf_t: 'ACC_CONFIG_PRF_13_0_MHZ',
  acc_rss_test_state_t: 'ACC_RSS_TEST_STATE_COMPLETE',
  acc_detector_distance_threshold_method_t: 'ACC_DETECTOR_DISTANCE_THRESHOLD_METHOD_FIXED_STRENGTH',
  acc_detector_distance_peak_sorting_t: 'ACC_DETECTOR_DISTANCE_PEAK_SORTING_STRONGEST',
  acc_sensor_id_t: '1',
  acc_detector_distance_reflector_shape_t: 'ACC_DETECTOR_DISTANCE_REFLECTOR_SHAPE_GENERIC',
};

/**
 * Touches a handful of libc/libm symbols so the stub archive links against
 * them like the real library would.
 */
export const DEFAULT_EXTRA_CODE = `
#include <math.h>
#include <complex.h>
#include <string.h>
#include <stdint.h>
float fake_external_dependencies(char* foo, complex float iq);
float fake_external_dependencies(char* foo, complex float iq)
{
    char buff[42];
    memcpy(buff, foo, 1);
    memset(foo, 0, 1);
    memmove(buff, foo, 1);
    uint32_t magnitude = (uint32_t) cabsf(iq);
    return roundf(atanf(sinf(cosf(log10f(powf(crealf(iq), 3.14))))));
}
`;

export const DEFAULT_DEPENDENCY_CALL = 'fake_external_dependencies("dummy", 1.0 + 2.0*I);';

/** Cortex-M4 hard-float flags the sensor SDK is built with. */
export const CORTEX_M4_FLAGS = [
  '-mcpu=cortex-m4',
  '-mthumb',
  '-mfloat-abi=hard',
  '-mfpu=fpv4-sp-d16',
  '-DTARGET_ARCH_cm4',
  '-DFLOAT_ABI_HARD',
  '-std=c99',
  '-O2',
  '-g',
  '-fno-math-errno',
  '-ffunction-sections',
  '-fdata-sections',
];

export const DEFAULT_COMPILE: CompileOptions = {
  toolchainPrefix: '',
  flags: ['-std=c99', '-O2'],
  validate: true,
};

export const DEFAULT_CONFIG: HeaderstubConfig = {
  includeDir: './include',
  outDir: '.',
  targets: DEFAULT_TARGETS,
  returnValues: DEFAULT_RETURN_VALUES,
  extraCode: DEFAULT_EXTRA_CODE,
  dependencyCall: DEFAULT_DEPENDENCY_CALL,
  dependencyTrigger: 'create',
  extractor: 'regex',
  debug: false,
};
