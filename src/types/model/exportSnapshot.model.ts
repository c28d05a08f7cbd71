export interface ExportSnapshot {
  "Personal Information": {
    Name: string;
    Age: number;
    Gender: string;
    "Height (cm)": number;
    "Weight (kg)": number;
    "Activity Level": string;
    Goal: string;
  };
  Calculations: {
    BMR: string;
    TDEE: string;
    "Target Calories": string;
  };
  Plans: {
    "Diet Plan": string;
    "Exercise Plan": string;
  };
}

export interface ExportRow {
  section: keyof ExportSnapshot;
  field: string;
  value: string | number;
}
