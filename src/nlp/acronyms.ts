/**
 * Cancer-indication acronyms and their expansions.
 * Expansion is additive: the acronym form stays a candidate too.
 */
export const CANCER_ACRONYMS: Readonly<Record<string, string>> = {
    'NSCLC': 'non-small cell lung cancer',
    'SCLC': 'small cell lung cancer',
    'TNBC': 'triple-negative breast cancer',
    'AML': 'acute myeloid leukemia',
    'B-ALL': 'B-cell acute lymphoblastic leukemia',
    'CLL': 'chronic lymphocytic leukemia',
    'CML': 'chronic myeloid leukemia',
    'DLBCL': 'diffuse large B-cell lymphoma',
    'MM': 'multiple myeloma',
    'MDS': 'myelodysplastic syndrome',
    'CRC': 'colorectal cancer',
    'CRPC': 'castrate-resistant prostate cancer',
    'mCRPC': 'metastatic castrate-resistant prostate cancer',
    'ESCC': 'esophageal squamous cell carcinoma',
    'HNSCC': 'head and neck squamous cell carcinoma',
    'HCC': 'hepatocellular carcinoma',
    'RCC': 'renal cell carcinoma',
    'NPC': 'nasopharyngeal carcinoma',
    'GBM': 'glioblastoma',
    'EWS': 'Ewing sarcoma',
};
