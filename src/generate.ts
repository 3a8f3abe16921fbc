import * as fs from 'fs/promises';
import { buildYear } from './calendar.js';
import { loadConfig } from './config.js';
import { debug, setDebugMode } from './logger.js';
import { generateIndex, saveAllMonths, saveYearlyData } from './output.js';

/**
 * 主程序：导出指定年份的农历月历 JSON
 */
async function main() {
  console.log('='.repeat(60));
  console.log('Chinese Lunar Calendar Exporter');
  console.log('='.repeat(60));

  const config = loadConfig();
  setDebugMode(config.debug);
  debug('Config:', config);

  await fs.mkdir(config.outputDir, { recursive: true });

  const generatedAt = new Date().toISOString();
  const processedYears: number[] = [];

  for (let year = config.startYear; year <= config.endYear; year++) {
    try {
      console.log(`\n📅 Processing: ${year}`);

      const monthlyData = buildYear(year, generatedAt);
      await saveAllMonths(monthlyData, config.outputDir);
      await saveYearlyData(monthlyData, config.outputDir);

      processedYears.push(year);
      console.log(`✅ Completed: ${year}`);
    } catch (error) {
      console.error(`❌ Error processing ${year}:`, error);
      // 继续处理其他年份
    }
  }

  if (processedYears.length === 0) {
    throw new Error('No calendar year could be generated');
  }

  console.log('\n📝 Generating index...');
  await generateIndex(config.outputDir, generatedAt);

  console.log('\n' + '='.repeat(60));
  console.log('✅ Calendar data generated successfully!');
  console.log(`📁 Output directory: ${config.outputDir}`);
  console.log(`📊 Processed years: ${processedYears.join(', ')}`);
  console.log('='.repeat(60));
}

// 执行主程序
main().catch((error: unknown) => {
  console.error('\n❌ Error generating calendar:', error);
  process.exit(1);
});
