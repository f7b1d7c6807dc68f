import { ExportLocale } from '../../config';
import { AgeGroup, Gender, MarketingChannel } from '../../types/sales';

export interface ExportLabels {
  header: readonly string[];
  ageGroup: Record<AgeGroup, string>;
  gender: Record<Gender, string>;
  channel: Record<MarketingChannel, string>;
}

const en: ExportLabels = {
  header: [
    'Event',
    'DateTime',
    'ProductName',
    'Quantity',
    'UnitPrice',
    'Amount',
    'AgeGroup',
    'Gender',
    'Channel',
    'Exhibitor',
    'Acquaintance',
    'Cashless',
    'Reserved',
    'Notes',
  ],
  ageGroup: {
    [AgeGroup.UNDER_18]: 'Under 18',
    [AgeGroup.TWENTIES]: '18-29',
    [AgeGroup.THIRTIES]: '30-39',
    [AgeGroup.FORTIES]: '40-49',
    [AgeGroup.FIFTIES_PLUS]: '50+',
  },
  gender: {
    [Gender.MALE]: 'Male',
    [Gender.FEMALE]: 'Female',
    [Gender.OTHER]: 'Other',
  },
  channel: {
    [MarketingChannel.SNS]: 'SNS',
    [MarketingChannel.BLOG]: 'Blog',
    [MarketingChannel.PASSERBY]: 'Passerby',
    [MarketingChannel.SAMPLE_BOOK]: 'Sample book',
    [MarketingChannel.REFERRAL]: 'Referral',
    [MarketingChannel.STAFF]: 'Staff',
  },
};

const ja: ExportLabels = {
  header: [
    'イベント名',
    '日時',
    '商品名',
    '数量',
    '単価',
    '金額',
    '年齢層',
    '性別',
    '経路',
    '出展者',
    '知人',
    'キャッシュレス決済',
    '取り置き',
    '特記事項',
  ],
  ageGroup: {
    [AgeGroup.UNDER_18]: '〜18歳',
    [AgeGroup.TWENTIES]: '18〜29歳',
    [AgeGroup.THIRTIES]: '30〜39歳',
    [AgeGroup.FORTIES]: '40〜49歳',
    [AgeGroup.FIFTIES_PLUS]: '50歳以上',
  },
  gender: {
    [Gender.MALE]: '男性',
    [Gender.FEMALE]: '女性',
    [Gender.OTHER]: 'その他',
  },
  channel: {
    [MarketingChannel.SNS]: 'SNS',
    [MarketingChannel.BLOG]: 'ブログ',
    [MarketingChannel.PASSERBY]: '通りがかり',
    [MarketingChannel.SAMPLE_BOOK]: '見本誌',
    [MarketingChannel.REFERRAL]: '知人の紹介・依頼',
    [MarketingChannel.STAFF]: '関係者',
  },
};

export const EXPORT_LABELS: Record<ExportLocale, ExportLabels> = { en, ja };
